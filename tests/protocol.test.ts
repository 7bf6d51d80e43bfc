/**
 * Wire framing tests — header layout, checksum and magic enforcement, deadlines.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  HEADER_SIZE,
  MAX_PAYLOAD_SIZE,
  decodeMessage,
  decodeVarInt,
  encodeMessage,
  encodeVarInt,
  encodeVarStr,
  parseHeader,
} from "../src/p2p/protocol.js";
import { createMemoryPair } from "../src/p2p/stream.js";
import { MAINNET, TESTNET } from "../src/types.js";

describe("encodeMessage", () => {
  it("frames an empty verack exactly like Bitcoin Core", () => {
    const msg = encodeMessage("verack", Buffer.alloc(0), MAINNET);
    assert.equal(msg.toString("hex"), "f9beb4d976657261636b000000000000000000005df6e0e2");
  });

  it("writes the payload length and appends the payload", () => {
    const payload = Buffer.from("hello");
    const msg = encodeMessage("ping", payload, MAINNET);
    assert.equal(msg.length, HEADER_SIZE + 5);
    assert.equal(msg.readUInt32LE(16), 5);
    assert.equal(msg.subarray(HEADER_SIZE).toString(), "hello");
  });

  it("truncates commands longer than 12 bytes", () => {
    const msg = encodeMessage("averyveryverylongcommand", Buffer.alloc(0), MAINNET);
    assert.equal(msg.subarray(4, 16).toString("ascii"), "averyveryver");
    assert.equal(msg.length, HEADER_SIZE);
  });

  it("uses the magic of the given network", () => {
    const msg = encodeMessage("verack", Buffer.alloc(0), TESTNET);
    assert.equal(msg.subarray(0, 4).toString("hex"), "0b110907");
  });
});

describe("parseHeader", () => {
  it("splits the header and trims null padding", () => {
    const header = parseHeader(encodeMessage("version", Buffer.from([1, 2, 3]), MAINNET));
    assert.equal(header.magic, MAINNET.magic);
    assert.equal(header.command, "version");
    assert.equal(header.payloadLength, 3);
    assert.equal(header.checksum.length, 4);
  });

  it("rejects a short buffer", () => {
    assert.throws(() => parseHeader(Buffer.alloc(10)), { code: "MALFORMED_PAYLOAD" });
  });
});

describe("decodeMessage", () => {
  it("reads a message written in several pieces", async () => {
    const [a, b] = createMemoryPair();
    const msg = encodeMessage("ping", Buffer.from("0102030405060708", "hex"), MAINNET);

    const pending = decodeMessage(b, 1_000, MAINNET);
    await a.write(msg.subarray(0, 10));
    await a.write(msg.subarray(10, 27));
    await a.write(msg.subarray(27));

    const decoded = await pending;
    assert.equal(decoded.command, "ping");
    assert.equal(decoded.payload.toString("hex"), "0102030405060708");
  });

  it("fails with CHECKSUM_MISMATCH when any payload byte is flipped", async () => {
    const payload = Buffer.from("abcde");
    for (let i = 0; i < payload.length; i++) {
      const msg = encodeMessage("test", payload, MAINNET);
      msg[HEADER_SIZE + i] ^= 0xff;

      const [a, b] = createMemoryPair();
      await a.write(msg);
      await assert.rejects(decodeMessage(b, 1_000, MAINNET), { code: "CHECKSUM_MISMATCH" });
    }
  });

  it("fails with MAGIC_MISMATCH for a foreign network, even with a valid payload", async () => {
    const [a, b] = createMemoryPair();
    await a.write(encodeMessage("verack", Buffer.alloc(0), TESTNET));
    await assert.rejects(decodeMessage(b, 1_000, MAINNET), {
      code: "MAGIC_MISMATCH",
      message: "magic mismatch: expected 0xd9b4bef9, got 0x0709110b",
    });
  });

  it("fails with TIMEOUT when nothing arrives", async () => {
    const [, b] = createMemoryPair();
    await assert.rejects(decodeMessage(b, 50, MAINNET), {
      code: "TIMEOUT",
      message: "deadline elapsed after 50ms",
    });
  });

  it("fails with TIMEOUT when the payload never completes", async () => {
    const [a, b] = createMemoryPair();
    const msg = encodeMessage("ping", Buffer.alloc(8, 7), MAINNET);
    await a.write(msg.subarray(0, HEADER_SIZE + 4));
    await assert.rejects(decodeMessage(b, 50, MAINNET), { code: "TIMEOUT", timeoutMs: 50 });
  });

  it("fails with CONNECTION_CLOSED when the stream ends mid-header", async () => {
    const [a, b] = createMemoryPair();
    await a.write(Buffer.from("f9beb4d9", "hex"));
    const pending = decodeMessage(b, 1_000, MAINNET);
    a.close();
    await assert.rejects(pending, { code: "CONNECTION_CLOSED" });
  });

  it("refuses a declared payload larger than the maximum", async () => {
    const [a, b] = createMemoryPair();
    const msg = encodeMessage("block", Buffer.alloc(0), MAINNET);
    msg.writeUInt32LE(MAX_PAYLOAD_SIZE + 1, 16);
    await a.write(msg);
    await assert.rejects(decodeMessage(b, 1_000, MAINNET), { code: "MALFORMED_PAYLOAD" });
  });
});

describe("CompactSize", () => {
  it("picks the shortest encoding", () => {
    assert.equal(encodeVarInt(0xfc).toString("hex"), "fc");
    assert.equal(encodeVarInt(0xfd).toString("hex"), "fdfd00");
    assert.equal(encodeVarInt(0xffff).toString("hex"), "fdffff");
    assert.equal(encodeVarInt(0x10000).toString("hex"), "fe00000100");
    assert.equal(encodeVarInt(0x100000000).toString("hex"), "ff0000000001000000");
  });

  it("decodes value and size at an offset", () => {
    const buf = Buffer.concat([Buffer.from([0xaa]), encodeVarInt(0x1234)]);
    assert.deepEqual(decodeVarInt(buf, 1), { value: 0x1234, size: 3 });
  });

  it("rejects a truncated varint", () => {
    assert.throws(() => decodeVarInt(Buffer.from([0xfe, 0x01]), 0), { code: "MALFORMED_PAYLOAD" });
    assert.throws(() => decodeVarInt(Buffer.alloc(0), 0), { code: "MALFORMED_PAYLOAD" });
  });

  it("prefixes strings with their UTF-8 byte length", () => {
    assert.equal(encodeVarStr("/ü/").toString("hex"), "042fc3bc2f");
  });
});
