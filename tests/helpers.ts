/**
 * Shared fixtures for the handshake tests.
 */

import type { Connector } from "../src/manager.js";
import { createNetworkAddress } from "../src/p2p/address.js";
import { performHandshake, type HandshakeOptions } from "../src/p2p/handshake.js";
import type { DnsResolver } from "../src/p2p/peers.js";
import { createMemoryPair } from "../src/p2p/stream.js";
import { MAINNET } from "../src/types.js";

export function handshakeOptions(partial: Partial<HandshakeOptions> = {}): HandshakeOptions {
  return {
    params: MAINNET,
    version: 70015,
    services: 0n,
    userAgent: "/test:1.0/",
    startHeight: 0,
    relay: false,
    remote: createNetworkAddress("10.0.0.2", 8333),
    local: createNetworkAddress("0.0.0.0", 0),
    stepTimeoutMs: 1_000,
    ...partial,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Connector that answers every connection with an in-memory responder
 * running the handshake as `responder`. Hosts in `refuse` fail to connect.
 */
export function memoryConnector(
  responder: Partial<HandshakeOptions> = {},
  refuse: readonly string[] = [],
): Connector {
  return async (peer) => {
    if (refuse.includes(peer.host)) throw new Error("ECONNREFUSED");
    const [local, remote] = createMemoryPair();
    void performHandshake(remote, handshakeOptions(responder)).finally(() => remote.close());
    return local;
  };
}

/** Resolver answering A queries from a fixed table; everything else fails */
export function stubResolver(table: Record<string, string[]>, v6: Record<string, string[]> = {}): DnsResolver {
  const lookup = (records: Record<string, string[]>, hostname: string): Promise<string[]> => {
    const found = records[hostname];
    return found ? Promise.resolve(found) : Promise.reject(new Error(`ENOTFOUND ${hostname}`));
  };
  return {
    resolve4: (hostname) => lookup(table, hostname),
    resolve6: (hostname) => lookup(v6, hostname),
  };
}
