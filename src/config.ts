/**
 * P2P Handshake — Config Loading + Validation
 *
 * Applies defaults to a raw config object and validates the result against
 * a TypeBox schema. The returned value is frozen.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

const Int32 = { minimum: -2_147_483_648, maximum: 2_147_483_647 } as const;

export const HandshakeConfigSchema = Type.Object({
  network: Type.Union([
    Type.Literal("mainnet"),
    Type.Literal("testnet"),
    Type.Literal("regtest"),
    Type.Literal("signet"),
  ]),
  /** Protocol version we announce */
  protocolVersion: Type.Integer(Int32),
  /** Service bits we announce (0 = NODE_NONE, we serve nothing) */
  services: Type.Integer({ minimum: 0, maximum: Number.MAX_SAFE_INTEGER }),
  userAgent: Type.String({ maxLength: 256 }),
  startHeight: Type.Integer(Int32),
  /** Whether the peer should relay transactions to us */
  relay: Type.Boolean(),
  /** Address placed in addr_from; most clients send 0.0.0.0:0 */
  localAddress: Type.Object({
    ip: Type.String({ minLength: 2 }),
    port: Type.Integer({ minimum: 0, maximum: 65_535 }),
  }),
  timeouts: Type.Object({
    /** TCP connect timeout (ms) */
    connectMs: Type.Integer({ minimum: 1 }),
    /** Deadline for each receive step of the handshake (ms) */
    stepMs: Type.Integer({ minimum: 1 }),
  }),
});

export type HandshakeConfig = Static<typeof HandshakeConfigSchema>;

/** Default configuration */
export const DEFAULTS: HandshakeConfig = {
  network: "mainnet",
  protocolVersion: 70015,
  services: 0,
  userAgent: "/p2p-handshake:0.1.0/",
  startHeight: 0,
  relay: false,
  localAddress: {
    ip: "0.0.0.0",
    port: 0,
  },
  timeouts: {
    connectMs: 5_000,
    stepMs: 2_000,
  },
};

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge helper — merges source into target, preferring source values.
 * Only merges plain objects; arrays and primitives are replaced.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (isRecord(srcVal) && isRecord(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (isRecord(value)) {
    for (const key of Object.keys(value)) deepFreeze(value[key]);
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse and validate a raw config object.
 * Returns a fully-populated, frozen HandshakeConfig with defaults applied.
 *
 * @throws ConfigError naming the first offending path
 */
export function parseHandshakeConfig(raw: unknown): Readonly<HandshakeConfig> {
  let source: Record<string, unknown> = {};
  if (isRecord(raw)) {
    source = raw;
  } else if (raw !== undefined && raw !== null) {
    throw new ConfigError("", "config must be an object");
  }

  const merged = deepMerge(structuredClone(DEFAULTS), source);

  if (!Value.Check(HandshakeConfigSchema, merged)) {
    const first = Value.Errors(HandshakeConfigSchema, merged).First();
    throw new ConfigError(first?.path ?? "", first?.message ?? "does not match schema");
  }

  return deepFreeze(merged);
}
