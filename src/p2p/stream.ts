/**
 * P2P Handshake — Byte Stream Transport
 *
 * Exact-length reads with a deadline over any Node readable/writable pair.
 * A TCP socket is both halves; tests wire two PassThrough streams crosswise.
 */

import { Socket } from "node:net";
import { PassThrough, type Readable, type Writable } from "node:stream";
import {
  ConnectFailedError,
  ConnectionClosedError,
  HandshakeError,
  TimeoutError,
} from "../errors.js";
import { formatPeer, type PeerAddress } from "../types.js";

// ============================================================================
// Types
// ============================================================================

export interface ByteStream {
  /**
   * Resolve with exactly `n` bytes. Rejects with TimeoutError once
   * `timeoutMs` passes, or ConnectionClosedError if the stream ends first.
   */
  read(n: number, timeoutMs: number): Promise<Buffer>;
  write(data: Buffer): Promise<void>;
  close(): void;
}

interface PendingRead {
  n: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

// ============================================================================
// Stream-backed implementation
// ============================================================================

export class StreamByteStream implements ByteStream {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private endCause: Error | undefined;
  private pending: PendingRead | null = null;

  constructor(
    private readonly readable: Readable,
    private readonly writable: Writable,
  ) {
    readable.on("data", this.onData);
    readable.on("end", this.onEnd);
    readable.on("close", this.onEnd);
    readable.on("error", this.onError);
    if (writable !== readable) writable.on("error", this.onError);
  }

  /** Peer IP when the readable half is a TCP socket */
  get remoteIp(): string | undefined {
    return this.readable instanceof Socket ? this.readable.remoteAddress : undefined;
  }

  read(n: number, timeoutMs: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new HandshakeError("READ_PENDING", "a read is already in progress"));
    }
    if (this.buffered >= n) {
      return Promise.resolve(this.take(n));
    }
    if (this.ended) {
      return Promise.reject(new ConnectionClosedError(n, this.buffered, { cause: this.endCause }));
    }

    return new Promise<Buffer>((resolve, reject) => {
      // On timeout the read is abandoned; bytes that arrive later stay buffered
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new TimeoutError(timeoutMs));
      }, timeoutMs);
      this.pending = { n, resolve, reject, timer };
    });
  }

  write(data: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.writable.destroyed || this.writable.writableEnded) {
        reject(new Error("stream is closed"));
        return;
      }
      this.writable.write(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(): void {
    this.onEnd();
    if (this.writable !== this.readable) this.writable.end();
    this.readable.destroy();
  }

  // -------- internals --------

  private take(n: number): Buffer {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
    const out = Buffer.from(all.subarray(0, n));
    const rest = all.subarray(n);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return out;
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    this.chunks.push(buf);
    this.buffered += buf.length;

    const pending = this.pending;
    if (pending && this.buffered >= pending.n) {
      clearTimeout(pending.timer);
      this.pending = null;
      pending.resolve(this.take(pending.n));
    }
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timer);
      this.pending = null;
      pending.reject(new ConnectionClosedError(pending.n, this.buffered, { cause: this.endCause }));
    }
  };

  private readonly onError = (err: Error): void => {
    this.endCause = err;
    this.onEnd();
  };
}

// ============================================================================
// TCP
// ============================================================================

/** Open a TCP connection to `peer`, failing after `timeoutMs` */
export function connect(peer: PeerAddress, timeoutMs: number): Promise<StreamByteStream> {
  const target = formatPeer(peer);

  return new Promise<StreamByteStream>((resolve, reject) => {
    const socket = new Socket();

    const fail = (cause: unknown) => {
      socket.removeAllListeners();
      socket.destroy();
      reject(new ConnectFailedError(target, cause));
    };

    socket.setTimeout(timeoutMs);
    socket.once("timeout", () => fail(new TimeoutError(timeoutMs)));
    socket.once("error", fail);

    socket.connect(peer.port, peer.host, () => {
      socket.setTimeout(0);
      socket.removeAllListeners("timeout");
      socket.removeAllListeners("error");
      resolve(new StreamByteStream(socket, socket));
    });
  });
}

// ============================================================================
// In-memory
// ============================================================================

/** Two streams wired to each other: what one writes the other reads */
export function createMemoryPair(): [StreamByteStream, StreamByteStream] {
  const aToB = new PassThrough();
  const bToA = new PassThrough();
  return [new StreamByteStream(bToA, aToB), new StreamByteStream(aToB, bToA)];
}
