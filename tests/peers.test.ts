/**
 * Peer discovery tests — DNS seeds behind a stub resolver, address parsing.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { discoverPeers, dnsSeedAt, getDnsSeeds, parsePeerAddress, resolveSeed } from "../src/p2p/peers.js";
import type { LogLevel } from "../src/types.js";
import { stubResolver } from "./helpers.js";

const resolver = stubResolver({
  "seed.bitcoin.sipa.be": ["1.1.1.1", "2.2.2.2"],
  "dnsseed.bluematt.me": ["2.2.2.2", "3.3.3.3"],
});

function collectLog() {
  const lines: { level: LogLevel; msg: string }[] = [];
  return { lines, log: (level: LogLevel, msg: string) => lines.push({ level, msg }) };
}

describe("DNS seeds", () => {
  it("lists the seeds of each network", () => {
    assert.equal(getDnsSeeds("mainnet").length, 9);
    assert.equal(getDnsSeeds("mainnet")[0], "seed.bitcoin.sipa.be");
    assert.deepEqual(getDnsSeeds("regtest"), []);
  });

  it("looks a seed up by index", () => {
    assert.equal(dnsSeedAt("mainnet", 1), "dnsseed.bluematt.me");
    assert.equal(dnsSeedAt("mainnet", 9), undefined);
    assert.equal(dnsSeedAt("mainnet", -1), undefined);
    assert.equal(dnsSeedAt("mainnet", 0.5), undefined);
    assert.equal(dnsSeedAt("regtest", 0), undefined);
  });
});

describe("resolveSeed", () => {
  it("pairs every resolved IP with the port", async () => {
    const peers = await resolveSeed("seed.bitcoin.sipa.be", 8333, resolver);
    assert.deepEqual(peers, [
      { host: "1.1.1.1", port: 8333 },
      { host: "2.2.2.2", port: 8333 },
    ]);
  });

  it("returns AAAA records when A lookups fail", async () => {
    const v6Only = stubResolver({}, { "seed.example": ["2001:db8::1"] });
    assert.deepEqual(await resolveSeed("seed.example", 18333, v6Only), [
      { host: "2001:db8::1", port: 18333 },
    ]);
  });

  it("throws DNS_LOOKUP_FAILED when both lookups fail", async () => {
    await assert.rejects(resolveSeed("nowhere.example", 8333, resolver), {
      code: "DNS_LOOKUP_FAILED",
      message: "DNS seed lookup failed for nowhere.example: ENOTFOUND nowhere.example",
    });
  });
});

describe("discoverPeers", () => {
  it("merges seeds, drops duplicates and keeps seed order", async () => {
    const { lines, log } = collectLog();
    const peers = await discoverPeers("mainnet", { shuffle: false, resolver, log });

    assert.deepEqual(peers, [
      { host: "1.1.1.1", port: 8333 },
      { host: "2.2.2.2", port: 8333 },
      { host: "3.3.3.3", port: 8333 },
    ]);
    assert.equal(lines.filter((l) => l.level === "warn").length, 7);
  });

  it("stops at maxPeers", async () => {
    const peers = await discoverPeers("mainnet", { shuffle: false, maxPeers: 2, resolver });
    assert.deepEqual(peers.map((p) => p.host), ["1.1.1.1", "2.2.2.2"]);
  });

  it("returns the same set when shuffled", async () => {
    const peers = await discoverPeers("mainnet", { resolver });
    assert.deepEqual(peers.map((p) => p.host).sort(), ["1.1.1.1", "2.2.2.2", "3.3.3.3"]);
  });

  it("returns nothing when every seed fails", async () => {
    const { lines, log } = collectLog();
    const peers = await discoverPeers("testnet", { resolver, log });
    assert.deepEqual(peers, []);
    assert.deepEqual(lines[lines.length - 1], {
      level: "warn",
      msg: "p2p-handshake: dns: no peers discovered from any DNS seed",
    });
  });
});

describe("parsePeerAddress", () => {
  it("applies the default port", () => {
    assert.deepEqual(parsePeerAddress("1.2.3.4", 8333), { host: "1.2.3.4", port: 8333 });
    assert.deepEqual(parsePeerAddress("node.example", 18333), { host: "node.example", port: 18333 });
  });

  it("reads an explicit port", () => {
    assert.deepEqual(parsePeerAddress("1.2.3.4:18444", 8333), { host: "1.2.3.4", port: 18444 });
  });

  it("handles IPv6 with and without brackets", () => {
    assert.deepEqual(parsePeerAddress("[2001:db8::1]:8334", 8333), { host: "2001:db8::1", port: 8334 });
    assert.deepEqual(parsePeerAddress("[::1]", 8333), { host: "::1", port: 8333 });
    assert.deepEqual(parsePeerAddress("2001:db8::1", 8333), { host: "2001:db8::1", port: 8333 });
  });

  it("rejects bad input", () => {
    for (const bad of ["1.2.3.4:0", "1.2.3.4:70000", "host:abc", "[::1", ":8333", "[::1]x"]) {
      assert.throws(() => parsePeerAddress(bad, 8333), { code: "INVALID_ADDRESS" }, bad);
    }
  });
});
