/**
 * Config parsing tests — defaults, deep merge, TypeBox validation.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { DEFAULTS, parseHandshakeConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("parseHandshakeConfig", () => {
  it("returns the defaults for an empty or missing config", () => {
    assert.deepEqual(parseHandshakeConfig(undefined), DEFAULTS);
    assert.deepEqual(parseHandshakeConfig({}), DEFAULTS);
  });

  it("merges nested values over the defaults", () => {
    const config = parseHandshakeConfig({ network: "testnet", timeouts: { stepMs: 500 } });
    assert.equal(config.network, "testnet");
    assert.equal(config.timeouts.stepMs, 500);
    assert.equal(config.timeouts.connectMs, DEFAULTS.timeouts.connectMs);
    assert.equal(config.userAgent, DEFAULTS.userAgent);
  });

  it("ignores keys explicitly set to undefined", () => {
    const config = parseHandshakeConfig({ network: undefined, userAgent: undefined });
    assert.equal(config.network, "mainnet");
    assert.equal(config.userAgent, DEFAULTS.userAgent);
  });

  it("does not share state with DEFAULTS", () => {
    const config = parseHandshakeConfig({});
    assert.notEqual(config.timeouts, DEFAULTS.timeouts);
    assert.ok(!Object.isFrozen(DEFAULTS));
  });

  it("freezes the result, nested objects included", () => {
    const config = parseHandshakeConfig({});
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.timeouts));
    assert.ok(Object.isFrozen(config.localAddress));
  });

  it("rejects an unknown network with its path", () => {
    assert.throws(
      () => parseHandshakeConfig({ network: "moonnet" }),
      (err: unknown) => err instanceof ConfigError && err.code === "INVALID_CONFIG" && err.path === "/network",
    );
  });

  it("rejects a zero step deadline", () => {
    assert.throws(
      () => parseHandshakeConfig({ timeouts: { stepMs: 0 } }),
      (err: unknown) => err instanceof ConfigError && err.path === "/timeouts/stepMs",
    );
  });

  it("rejects a non-integer protocol version", () => {
    assert.throws(
      () => parseHandshakeConfig({ protocolVersion: 70015.5 }),
      (err: unknown) => err instanceof ConfigError && err.path === "/protocolVersion",
    );
  });

  it("rejects a config that is not an object", () => {
    assert.throws(() => parseHandshakeConfig("mainnet"), {
      code: "INVALID_CONFIG",
      message: "invalid config at /: config must be an object",
    });
    assert.throws(() => parseHandshakeConfig([]), { code: "INVALID_CONFIG" });
  });
});
