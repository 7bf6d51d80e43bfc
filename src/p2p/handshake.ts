/**
 * P2P Handshake — Version Handshake State Machine
 *
 * Flow (single shot, no retries):
 *   1. Send version                       Init            → VersionSent
 *   2. Read version (step deadline)       VersionSent     → VersionReceived
 *   3. Send verack                        VersionReceived → VerackSent
 *   4. Read verack (step deadline)        VerackSent      → Completed
 *
 * Any failure ends the attempt with a Failure outcome tagged with the stage
 * that was running. The stream is borrowed; closing it is the caller's job.
 */

import {
  HandshakeFailedError,
  ObsoleteVersionError,
  SelfConnectionError,
  SendFailedError,
  UnexpectedCommandError,
  toHandshakeError,
  type HandshakeError,
} from "../errors.js";
import type { NetworkParams } from "../types.js";
import type { NetworkAddress } from "./address.js";
import { VERACK_COMMAND, VERSION_COMMAND, decodeMessage } from "./protocol.js";
import type { ByteStream } from "./stream.js";
import { encodeVerackMessage, isVerack } from "./verack.js";
import { encodeVersionMessage, parseVersionPayload } from "./version.js";

// ============================================================================
// Types
// ============================================================================

export type HandshakeState =
  | "Init"
  | "VersionSent"
  | "VersionReceived"
  | "VerackSent"
  | "Completed"
  | "Failed";

/** What the attempt was doing when it stopped */
export type HandshakeStage =
  | "Connecting"
  | "SendingVersion"
  | "AwaitingVersion"
  | "SendingVerack"
  | "AwaitingVerack";

export type HandshakeEvent =
  | { type: "version-sent"; nonce: bigint }
  | { type: "version-received"; version: number; userAgent: string; startHeight: number }
  | { type: "verack-sent" }
  | { type: "verack-received" };

export interface HandshakeSuccess {
  status: "success";
  /** min(local, remote) */
  negotiatedVersion: number;
  localVersion: number;
  remoteVersion: number;
  remoteServices: bigint;
  remoteUserAgent: string;
  remoteStartHeight: number;
}

export interface HandshakeFailure {
  status: "failure";
  stage: HandshakeStage;
  error: HandshakeError;
}

export type HandshakeOutcome = HandshakeSuccess | HandshakeFailure;

export interface HandshakeOptions {
  params: NetworkParams;
  /** Protocol version we announce */
  version: number;
  services: bigint;
  userAgent: string;
  startHeight: number;
  relay: boolean;
  /** Goes into addr_recv */
  remote: NetworkAddress;
  /** Goes into addr_from */
  local: NetworkAddress;
  /** Deadline for each receive step (ms) */
  stepTimeoutMs: number;
  /** Progress observer; purely informational */
  onEvent?: (event: HandshakeEvent) => void;
}

// ============================================================================
// Session
// ============================================================================

const STAGE_OF: Record<Exclude<HandshakeState, "Completed" | "Failed">, HandshakeStage> = {
  Init: "SendingVersion",
  VersionSent: "AwaitingVersion",
  VersionReceived: "SendingVerack",
  VerackSent: "AwaitingVerack",
};

/** Per-attempt state; never shared between attempts */
export class HandshakeSession {
  private _state: HandshakeState = "Init";
  private _remoteVersion: number | undefined;

  constructor(
    public readonly localVersion: number,
    public readonly localNonce: bigint,
  ) {}

  get state(): HandshakeState {
    return this._state;
  }

  get remoteVersion(): number | undefined {
    return this._remoteVersion;
  }

  get stage(): HandshakeStage {
    if (this._state === "Completed" || this._state === "Failed") {
      throw new Error(`session is terminal (${this._state})`);
    }
    return STAGE_OF[this._state];
  }

  advance(next: HandshakeState): void {
    this._state = next;
  }

  recordRemoteVersion(version: number): void {
    this._remoteVersion = version;
  }
}

// ============================================================================
// Handshake
// ============================================================================

/**
 * Run the version/verack exchange over `stream`.
 * Never throws; every failure comes back as a Failure outcome.
 */
export async function performHandshake(
  stream: ByteStream,
  options: HandshakeOptions,
): Promise<HandshakeOutcome> {
  const { params, stepTimeoutMs } = options;
  const emit = (event: HandshakeEvent): void => {
    try {
      options.onEvent?.(event);
    } catch {
      // Observer errors never change the outcome
    }
  };

  // Unset until the version message is built; a build error fails SendingVersion
  let session: HandshakeSession | undefined;

  try {
    const { message: versionMsg, nonce } = encodeVersionMessage(
      {
        version: options.version,
        services: options.services,
        addrRecv: options.remote,
        addrFrom: options.local,
        userAgent: options.userAgent,
        startHeight: options.startHeight,
        relay: options.relay,
      },
      params,
    );
    session = new HandshakeSession(options.version, nonce);

    // 1. Init → VersionSent
    await send(stream, VERSION_COMMAND, versionMsg);
    session.advance("VersionSent");
    emit({ type: "version-sent", nonce });

    // 2. VersionSent → VersionReceived
    const theirs = await decodeMessage(stream, stepTimeoutMs, params);
    if (theirs.command !== VERSION_COMMAND) {
      throw new UnexpectedCommandError(VERSION_COMMAND, theirs.command);
    }
    const remote = parseVersionPayload(theirs.payload);
    if (remote.nonce === session.localNonce) {
      throw new SelfConnectionError(remote.nonce);
    }
    if (remote.version < params.minProtocolVersion) {
      throw new ObsoleteVersionError(remote.version, params.minProtocolVersion);
    }
    session.recordRemoteVersion(remote.version);
    session.advance("VersionReceived");
    emit({
      type: "version-received",
      version: remote.version,
      userAgent: remote.userAgent,
      startHeight: remote.startHeight,
    });

    // 3. VersionReceived → VerackSent
    await send(stream, VERACK_COMMAND, encodeVerackMessage(params));
    session.advance("VerackSent");
    emit({ type: "verack-sent" });

    // 4. VerackSent → Completed (payload is empty; only the command matters)
    const ack = await decodeMessage(stream, stepTimeoutMs, params);
    if (!isVerack(ack.command)) {
      throw new UnexpectedCommandError(VERACK_COMMAND, ack.command);
    }
    session.advance("Completed");
    emit({ type: "verack-received" });

    const outcome: HandshakeSuccess = {
      status: "success",
      negotiatedVersion: Math.min(session.localVersion, remote.version),
      localVersion: session.localVersion,
      remoteVersion: remote.version,
      remoteServices: remote.services,
      remoteUserAgent: remote.userAgent,
      remoteStartHeight: remote.startHeight,
    };
    return Object.freeze(outcome);
  } catch (err: unknown) {
    if (session === undefined) {
      return failure("SendingVersion", toHandshakeError(err, "INVALID_OPTIONS"));
    }
    const stage = session.stage;
    session.advance("Failed");
    return failure(stage, toHandshakeError(err));
  }
}

async function send(stream: ByteStream, command: string, message: Buffer): Promise<void> {
  try {
    await stream.write(message);
  } catch (err: unknown) {
    throw new SendFailedError(command, err);
  }
}

// ============================================================================
// Outcome helpers
// ============================================================================

export function failure(stage: HandshakeStage, error: HandshakeError): HandshakeFailure {
  const outcome: HandshakeFailure = { status: "failure", stage, error };
  return Object.freeze(outcome);
}

/** "handshake failed at stage X, caused by: <inner message>" */
export function describeFailure(outcome: HandshakeFailure): string {
  return `handshake failed at stage ${outcome.stage}, caused by: ${outcome.error.message}`;
}

/** Turn a Failure outcome into a throwable with the inner error as `cause` */
export function toFailedError(outcome: HandshakeFailure): HandshakeFailedError {
  return new HandshakeFailedError(outcome.stage, outcome.error);
}
