/**
 * P2P Handshake — Peer Discovery
 *
 * Discovers Bitcoin nodes via DNS seed queries and parses peer addresses
 * given on the command line.
 */

import { promises as dns } from "node:dns";
import { isIPv6 } from "node:net";
import { DnsLookupError, HandshakeError, errorMessage } from "../errors.js";
import { getNetworkParams, noopLog, type LogFn, type Network, type PeerAddress } from "../types.js";

// ============================================================================
// Types
// ============================================================================

/** The slice of node:dns we use; injectable for tests */
export interface DnsResolver {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

export interface DiscoverOptions {
  /** Maximum number of peers to return (default: 8) */
  maxPeers?: number;
  /** Randomize the order before truncating (default: true) */
  shuffle?: boolean;
  resolver?: DnsResolver;
  log?: LogFn;
}

const systemResolver: DnsResolver = {
  resolve4: (hostname) => dns.resolve4(hostname),
  resolve6: (hostname) => dns.resolve6(hostname),
};

// ============================================================================
// DNS Seeds
// ============================================================================

export function getDnsSeeds(network: Network): readonly string[] {
  return getNetworkParams(network).dnsSeeds;
}

export function dnsSeedAt(network: Network, index: number): string | undefined {
  const seeds = getDnsSeeds(network);
  return Number.isInteger(index) && index >= 0 ? seeds[index] : undefined;
}

// ============================================================================
// DNS Resolution
// ============================================================================

/**
 * Resolve a single DNS seed to peer addresses (A and AAAA records).
 *
 * @throws DnsLookupError when neither record type resolves
 */
export async function resolveSeed(
  seed: string,
  port: number,
  resolver: DnsResolver = systemResolver,
  log: LogFn = noopLog,
): Promise<PeerAddress[]> {
  const [v4, v6] = await Promise.allSettled([resolver.resolve4(seed), resolver.resolve6(seed)]);

  if (v4.status === "rejected" && v6.status === "rejected") {
    throw new DnsLookupError(seed, v4.reason);
  }

  const ips = [
    ...(v4.status === "fulfilled" ? v4.value : []),
    ...(v6.status === "fulfilled" ? v6.value : []),
  ];
  log("info", `p2p-handshake: dns: ${seed} → ${ips.length} peers`);

  return ips.map((host) => ({ host, port }));
}

/**
 * Discover peers by querying every DNS seed of the network.
 *
 * Queries all seeds in parallel, collects unique addresses, optionally
 * shuffles, and returns up to `maxPeers` results. Never throws.
 */
export async function discoverPeers(
  network: Network,
  options: DiscoverOptions = {},
): Promise<PeerAddress[]> {
  const { maxPeers = 8, shuffle = true, resolver = systemResolver, log = noopLog } = options;
  const { dnsSeeds, defaultPort } = getNetworkParams(network);

  log("info", `p2p-handshake: dns: querying ${dnsSeeds.length} DNS seeds for ${network} peers...`);

  const results = await Promise.allSettled(
    dnsSeeds.map((seed) => resolveSeed(seed, defaultPort, resolver, log)),
  );

  // Collect unique hosts, preserving seed order
  const unique = new Map<string, PeerAddress>();
  results.forEach((result, i) => {
    if (result.status === "fulfilled") {
      for (const peer of result.value) unique.set(peer.host, peer);
    } else {
      log("warn", `p2p-handshake: dns: seed ${dnsSeeds[i]} failed: ${errorMessage(result.reason)}`);
    }
  });

  const all = Array.from(unique.values());
  if (all.length === 0) {
    log("warn", "p2p-handshake: dns: no peers discovered from any DNS seed");
    return [];
  }

  if (shuffle) {
    // Fisher-Yates
    for (let i = all.length - 1; i > 0; i--) {
      const j = Math.floor(Math.random() * (i + 1));
      [all[i], all[j]] = [all[j], all[i]];
    }
  }

  const selected = all.slice(0, maxPeers);
  log("info", `p2p-handshake: dns: selected ${selected.length} of ${all.length} peers`);
  return selected;
}

// ============================================================================
// Address parsing
// ============================================================================

/**
 * Parse "host", "host:port", "[v6]:port" or a bare IPv6 literal.
 */
export function parsePeerAddress(text: string, defaultPort: number): PeerAddress {
  const input = text.trim();
  let host = input;
  let portText: string | undefined;

  if (input.startsWith("[")) {
    const close = input.indexOf("]");
    if (close === -1) {
      throw new HandshakeError("INVALID_ADDRESS", `unterminated '[' in ${text}`);
    }
    host = input.slice(1, close);
    const rest = input.slice(close + 1);
    if (rest.startsWith(":")) portText = rest.slice(1);
    else if (rest.length > 0) throw new HandshakeError("INVALID_ADDRESS", `unexpected '${rest}' in ${text}`);
  } else if (!isIPv6(input)) {
    const colon = input.lastIndexOf(":");
    if (colon !== -1) {
      host = input.slice(0, colon);
      portText = input.slice(colon + 1);
    }
  }

  if (host.length === 0) {
    throw new HandshakeError("INVALID_ADDRESS", `missing host in ${text}`);
  }

  let port = defaultPort;
  if (portText !== undefined) {
    port = /^\d+$/.test(portText) ? Number(portText) : NaN;
    if (!Number.isInteger(port) || port < 1 || port > 0xffff) {
      throw new HandshakeError("INVALID_ADDRESS", `invalid port in ${text}`);
    }
  }

  return { host, port };
}
