/**
 * P2P Handshake — Custom Error Types
 *
 * Every failure carries a stable `code` so callers can branch on the kind
 * without matching message text.
 */

import type { HandshakeStage } from "./p2p/handshake.js";

/** Base handshake error — all protocol and transport errors extend this */
export class HandshakeError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HandshakeError";
    this.code = code;
  }
}

/** A read did not complete before its deadline */
export class TimeoutError extends HandshakeError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("TIMEOUT", `deadline elapsed after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The stream ended before the expected number of bytes arrived */
export class ConnectionClosedError extends HandshakeError {
  public readonly expected: number;
  public readonly received: number;

  constructor(expected: number, received: number, options?: ErrorOptions) {
    super(
      "CONNECTION_CLOSED",
      `connection closed after ${received} of ${expected} bytes`,
      options,
    );
    this.name = "ConnectionClosedError";
    this.expected = expected;
    this.received = received;
  }
}

/** Header magic belongs to a different network */
export class MagicMismatchError extends HandshakeError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      "MAGIC_MISMATCH",
      `magic mismatch: expected 0x${hex32(expected)}, got 0x${hex32(actual)}`,
    );
    this.name = "MagicMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** Payload checksum does not match the header */
export class ChecksumMismatchError extends HandshakeError {
  public readonly command: string;

  constructor(command: string, expected: Buffer, actual: Buffer) {
    super(
      "CHECKSUM_MISMATCH",
      `checksum mismatch on '${command}': header ${expected.toString("hex")}, payload ${actual.toString("hex")}`,
    );
    this.name = "ChecksumMismatchError";
    this.command = command;
  }
}

/** Payload bytes cannot be decoded into the expected structure */
export class MalformedPayloadError extends HandshakeError {
  constructor(message: string) {
    super("MALFORMED_PAYLOAD", message);
    this.name = "MalformedPayloadError";
  }
}

/** Peer sent a message other than the one the current step requires */
export class UnexpectedCommandError extends HandshakeError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(expected: string, actual: string) {
    super("UNEXPECTED_COMMAND", `expected '${expected}' but received '${actual}'`);
    this.name = "UnexpectedCommandError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** Writing to the stream failed */
export class SendFailedError extends HandshakeError {
  public readonly command: string;

  constructor(command: string, cause: unknown) {
    super("SEND_FAILED", `failed to send '${command}': ${errorMessage(cause)}`, { cause });
    this.name = "SendFailedError";
    this.command = command;
  }
}

/** Remote version nonce equals ours — we are talking to ourselves */
export class SelfConnectionError extends HandshakeError {
  constructor(nonce: bigint) {
    super("SELF_CONNECTION", `connected to self (nonce 0x${nonce.toString(16)})`);
    this.name = "SelfConnectionError";
  }
}

/** Remote protocol version is below the network minimum */
export class ObsoleteVersionError extends HandshakeError {
  public readonly version: number;
  public readonly minimum: number;

  constructor(version: number, minimum: number) {
    super(
      "OBSOLETE_VERSION",
      `peer protocol version ${version} is below the minimum ${minimum}`,
    );
    this.name = "ObsoleteVersionError";
    this.version = version;
    this.minimum = minimum;
  }
}

/** TCP connection could not be established */
export class ConnectFailedError extends HandshakeError {
  public readonly target: string;

  constructor(target: string, cause: unknown) {
    super("CONNECT_FAILED", `could not connect to ${target}: ${errorMessage(cause)}`, { cause });
    this.name = "ConnectFailedError";
    this.target = target;
  }
}

/** DNS seed lookup failed */
export class DnsLookupError extends HandshakeError {
  public readonly seed: string;

  constructor(seed: string, cause: unknown) {
    super("DNS_LOOKUP_FAILED", `DNS seed lookup failed for ${seed}: ${errorMessage(cause)}`, { cause });
    this.name = "DnsLookupError";
    this.seed = seed;
  }
}

/** Configuration did not pass validation */
export class ConfigError extends HandshakeError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super("INVALID_CONFIG", `invalid config at ${path || "/"}: ${message}`);
    this.name = "ConfigError";
    this.path = path;
  }
}

/**
 * Outer layer of a failed attempt: the stage it stopped at, with the specific
 * transport or protocol error attached as `cause`.
 */
export class HandshakeFailedError extends HandshakeError {
  public readonly stage: HandshakeStage;
  public override readonly cause: HandshakeError;

  constructor(stage: HandshakeStage, cause: HandshakeError) {
    super("HANDSHAKE_FAILED", `handshake failed at stage ${stage}`, { cause });
    this.name = "HandshakeFailedError";
    this.stage = stage;
    this.cause = cause;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalise anything thrown into a HandshakeError, keeping the original as `cause` */
export function toHandshakeError(err: unknown, fallbackCode: string = "UNKNOWN"): HandshakeError {
  if (err instanceof HandshakeError) return err;
  return new HandshakeError(fallbackCode, errorMessage(err), { cause: err });
}

function hex32(n: number): string {
  return (n >>> 0).toString(16).padStart(8, "0");
}
