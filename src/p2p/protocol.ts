/**
 * P2P Handshake — Wire Message Framing
 *
 * Envelope codec for the Bitcoin P2P protocol: every message is a 24-byte
 * header followed by the payload it describes.
 *
 * Reference: https://en.bitcoin.it/wiki/Protocol_documentation#Message_structure
 */

import { createHash } from "node:crypto";
import {
  ChecksumMismatchError,
  MagicMismatchError,
  MalformedPayloadError,
  TimeoutError,
} from "../errors.js";
import type { NetworkParams } from "../types.js";
import type { ByteStream } from "./stream.js";

// ============================================================================
// Constants
// ============================================================================

/** Header size: magic(4) + command(12) + length(4) + checksum(4) */
export const HEADER_SIZE = 24;

export const COMMAND_SIZE = 12;

export const CHECKSUM_SIZE = 4;

/** Largest payload we are willing to wait for (MAX_SIZE, 32 MiB) */
export const MAX_PAYLOAD_SIZE = 0x02000000;

export const VERSION_COMMAND = "version";
export const VERACK_COMMAND = "verack";

// ============================================================================
// Types
// ============================================================================

export interface MessageHeader {
  magic: number;
  command: string;
  payloadLength: number;
  checksum: Buffer;
}

export interface WireMessage {
  command: string;
  payload: Buffer;
}

// ============================================================================
// Double-SHA256
// ============================================================================

/** Compute double-SHA256 of a buffer (standard Bitcoin hash) */
export function doubleSha256(data: Buffer): Buffer {
  const first = createHash("sha256").update(data).digest();
  return createHash("sha256").update(first).digest();
}

/** First 4 bytes of dSHA256(payload) */
export function checksum(payload: Buffer): Buffer {
  return doubleSha256(payload).subarray(0, CHECKSUM_SIZE);
}

// ============================================================================
// Message Framing
// ============================================================================

/**
 * Build a complete P2P message with header + payload.
 *
 * Format:
 *   [4] magic (LE)
 *   [12] command (null-padded ASCII, truncated past 12 bytes)
 *   [4] payload length (LE)
 *   [4] checksum (first 4 bytes of dSHA256(payload))
 *   [n] payload
 */
export function encodeMessage(command: string, payload: Buffer, params: NetworkParams): Buffer {
  const header = Buffer.alloc(HEADER_SIZE);

  header.writeUInt32LE(params.magic, 0);
  // Buffer#write stops at the end of the target range, which truncates long names
  header.write(command, 4, COMMAND_SIZE, "ascii");
  header.writeUInt32LE(payload.length, 16);
  checksum(payload).copy(header, 20);

  return Buffer.concat([header, payload]);
}

/** Split a 24-byte header into its fields. No validation beyond size. */
export function parseHeader(data: Buffer): MessageHeader {
  if (data.length < HEADER_SIZE) {
    throw new MalformedPayloadError(`header needs ${HEADER_SIZE} bytes, got ${data.length}`);
  }

  // Command: 12 bytes, trim at first null
  const cmdRaw = data.subarray(4, 4 + COMMAND_SIZE);
  const nullIdx = cmdRaw.indexOf(0);
  const command = cmdRaw.subarray(0, nullIdx === -1 ? COMMAND_SIZE : nullIdx).toString("ascii");

  return {
    magic: data.readUInt32LE(0),
    command,
    payloadLength: data.readUInt32LE(16),
    checksum: Buffer.from(data.subarray(20, HEADER_SIZE)),
  };
}

/**
 * Read one framed message from the stream.
 *
 * The header and payload share a single deadline of `timeoutMs`. Magic is
 * checked before the payload is read; the checksum after.
 */
export async function decodeMessage(
  stream: ByteStream,
  timeoutMs: number,
  params: NetworkParams,
): Promise<WireMessage> {
  const deadline = Date.now() + timeoutMs;

  const header = parseHeader(await stream.read(HEADER_SIZE, timeoutMs));

  if (header.magic !== params.magic) {
    throw new MagicMismatchError(params.magic, header.magic);
  }
  if (header.payloadLength > MAX_PAYLOAD_SIZE) {
    throw new MalformedPayloadError(
      `'${header.command}' declares ${header.payloadLength} payload bytes (max ${MAX_PAYLOAD_SIZE})`,
    );
  }

  let payload: Buffer = Buffer.alloc(0);
  if (header.payloadLength > 0) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) throw new TimeoutError(timeoutMs);
    try {
      payload = await stream.read(header.payloadLength, remaining);
    } catch (err: unknown) {
      // Report the step's full budget, not whatever was left of it
      if (err instanceof TimeoutError) throw new TimeoutError(timeoutMs);
      throw err;
    }
  }

  const actual = checksum(payload);
  if (!actual.equals(header.checksum)) {
    throw new ChecksumMismatchError(header.command, header.checksum, actual);
  }

  return { command: header.command, payload };
}

// ============================================================================
// Variable-length integer (CompactSize)
// ============================================================================

/** Encode a variable-length integer (CompactSize / varint) */
export function encodeVarInt(n: number): Buffer {
  if (n < 0xfd) {
    const buf = Buffer.alloc(1);
    buf.writeUInt8(n, 0);
    return buf;
  } else if (n <= 0xffff) {
    const buf = Buffer.alloc(3);
    buf.writeUInt8(0xfd, 0);
    buf.writeUInt16LE(n, 1);
    return buf;
  } else if (n <= 0xffffffff) {
    const buf = Buffer.alloc(5);
    buf.writeUInt8(0xfe, 0);
    buf.writeUInt32LE(n, 1);
    return buf;
  } else {
    const buf = Buffer.alloc(9);
    buf.writeUInt8(0xff, 0);
    buf.writeBigUInt64LE(BigInt(n), 1);
    return buf;
  }
}

/**
 * Decode a CompactSize at `offset`.
 * @returns the value and how many bytes it occupied
 */
export function decodeVarInt(data: Buffer, offset: number): { value: number; size: number } {
  if (offset >= data.length) {
    throw new MalformedPayloadError(`varint at offset ${offset} is past the end of the buffer`);
  }

  const prefix = data.readUInt8(offset);
  const size = prefix < 0xfd ? 1 : prefix === 0xfd ? 3 : prefix === 0xfe ? 5 : 9;
  if (offset + size > data.length) {
    throw new MalformedPayloadError(`varint at offset ${offset} needs ${size} bytes`);
  }

  switch (size) {
    case 1:
      return { value: prefix, size };
    case 3:
      return { value: data.readUInt16LE(offset + 1), size };
    case 5:
      return { value: data.readUInt32LE(offset + 1), size };
    default: {
      const big = data.readBigUInt64LE(offset + 1);
      if (big > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new MalformedPayloadError(`varint ${big} at offset ${offset} is out of range`);
      }
      return { value: Number(big), size };
    }
  }
}

/** Encode a variable-length string (varint length prefix + bytes) */
export function encodeVarStr(str: string): Buffer {
  const strBuf = Buffer.from(str, "utf8");
  return Buffer.concat([encodeVarInt(strBuf.length), strBuf]);
}
