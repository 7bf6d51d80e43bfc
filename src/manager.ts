/**
 * P2P Handshake — Handshake Manager
 *
 * Connects to a peer, runs the handshake, closes the connection and keeps
 * the last outcome per peer. Attempts run one at a time.
 *
 * Flow per peer:
 *   1. TCP connect (connect timeout)
 *   2. version → version → verack → verack (step timeout per receive)
 *   3. Disconnect
 */

import { Mutex } from "async-mutex";
import { isIP } from "node:net";
import type { HandshakeConfig } from "./config.js";
import { ConnectFailedError } from "./errors.js";
import { createNetworkAddress, type NetworkAddress } from "./p2p/address.js";
import {
  describeFailure,
  failure,
  performHandshake,
  type HandshakeEvent,
  type HandshakeOutcome,
} from "./p2p/handshake.js";
import { connect, type ByteStream } from "./p2p/stream.js";
import {
  formatPeer,
  getNetworkParams,
  noopLog,
  type LogFn,
  type NetworkParams,
  type PeerAddress,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

/** Opens the transport to a peer; `remoteIp` is the address actually reached */
export type Connector = (
  peer: PeerAddress,
  timeoutMs: number,
) => Promise<ByteStream & { readonly remoteIp?: string }>;

export interface HandshakeRecord {
  peer: PeerAddress;
  outcome: HandshakeOutcome;
  /** ISO timestamp of when the attempt finished */
  at: string;
}

export interface HandshakeManagerOptions {
  log?: LogFn;
  connect?: Connector;
}

export interface FirstSuccessResult {
  /** The first peer that completed the handshake, if any */
  success?: HandshakeRecord;
  /** Every attempt made, in order */
  attempts: HandshakeRecord[];
}

// ============================================================================
// Manager
// ============================================================================

export class HandshakeManager {
  private readonly params: NetworkParams;
  private readonly local: NetworkAddress;
  private readonly log: LogFn;
  private readonly connector: Connector;
  /** One attempt at a time */
  private readonly attemptMutex = new Mutex();
  private readonly records = new Map<string, HandshakeRecord>();

  constructor(
    private readonly config: Readonly<HandshakeConfig>,
    options: HandshakeManagerOptions = {},
  ) {
    this.params = getNetworkParams(config.network);
    this.local = createNetworkAddress(
      config.localAddress.ip,
      config.localAddress.port,
      BigInt(config.services),
    );
    this.log = options.log ?? noopLog;
    this.connector = options.connect ?? connect;
  }

  /** Connect to `peer` and run one handshake attempt */
  handshake(peer: PeerAddress): Promise<HandshakeOutcome> {
    return this.attemptMutex.runExclusive(() => this.attempt(peer));
  }

  /**
   * Try candidates in order until one completes the handshake.
   * Failures are recorded and logged, never thrown.
   */
  async handshakeFirst(peers: readonly PeerAddress[]): Promise<FirstSuccessResult> {
    const attempts: HandshakeRecord[] = [];
    for (const peer of peers) {
      await this.handshake(peer);
      const record = this.getRecord(peer);
      if (!record) continue;
      attempts.push(record);
      if (record.outcome.status === "success") {
        return { success: record, attempts };
      }
    }
    return { attempts };
  }

  getRecord(peer: PeerAddress): HandshakeRecord | undefined {
    return this.records.get(formatPeer(peer));
  }

  getRecords(): HandshakeRecord[] {
    return Array.from(this.records.values());
  }

  // -------- internals --------

  private async attempt(peer: PeerAddress): Promise<HandshakeOutcome> {
    const tag = formatPeer(peer);
    this.log("info", `p2p-handshake: p2p: [${tag}] connecting...`);

    let stream: Awaited<ReturnType<Connector>>;
    try {
      stream = await this.connector(peer, this.config.timeouts.connectMs);
    } catch (err: unknown) {
      const error = err instanceof ConnectFailedError ? err : new ConnectFailedError(tag, err);
      return this.finish(peer, failure("Connecting", error));
    }

    this.log("info", `p2p-handshake: p2p: [${tag}] connected — sending version`);

    const remoteIp = stream.remoteIp ?? (isIP(peer.host) ? peer.host : "0.0.0.0");
    try {
      const outcome = await performHandshake(stream, {
        params: this.params,
        version: this.config.protocolVersion,
        services: BigInt(this.config.services),
        userAgent: this.config.userAgent,
        startHeight: this.config.startHeight,
        relay: this.config.relay,
        remote: createNetworkAddress(remoteIp, peer.port),
        local: this.local,
        stepTimeoutMs: this.config.timeouts.stepMs,
        onEvent: (event) => this.logEvent(tag, event),
      });
      return this.finish(peer, outcome);
    } finally {
      stream.close();
    }
  }

  private finish(peer: PeerAddress, outcome: HandshakeOutcome): HandshakeOutcome {
    const tag = formatPeer(peer);
    this.records.set(tag, { peer, outcome, at: new Date().toISOString() });

    if (outcome.status === "success") {
      this.log(
        "info",
        `p2p-handshake: p2p: [${tag}] handshake complete — negotiated version ${outcome.negotiatedVersion}`,
      );
    } else {
      this.log("warn", `p2p-handshake: p2p: [${tag}] ${describeFailure(outcome)}`);
    }
    return outcome;
  }

  private logEvent(tag: string, event: HandshakeEvent): void {
    switch (event.type) {
      case "version-sent":
        this.log("info", `p2p-handshake: p2p: [${tag}] sent version`);
        break;
      case "version-received":
        this.log(
          "info",
          `p2p-handshake: p2p: [${tag}] received version ${event.version} ` +
            `(${event.userAgent || "no user agent"}, height ${event.startHeight})`,
        );
        break;
      case "verack-sent":
        this.log("info", `p2p-handshake: p2p: [${tag}] sent verack`);
        break;
      case "verack-received":
        this.log("info", `p2p-handshake: p2p: [${tag}] received verack`);
        break;
    }
  }
}
