/**
 * P2P Handshake — Type Definitions
 *
 * Shared interfaces for network parameters, configuration, and logging.
 */

// ============================================================================
// Network Parameters
// ============================================================================

export type Network = "mainnet" | "testnet" | "regtest" | "signet";

export interface NetworkParams {
  network: Network;
  /** Message start bytes, written little-endian as a uint32 */
  magic: number;
  defaultPort: number;
  /** Peers announcing a lower protocol version are refused */
  minProtocolVersion: number;
  dnsSeeds: readonly string[];
}

/** Oldest protocol version Bitcoin Core still accepts (MIN_PEER_PROTO_VERSION) */
export const MIN_PEER_PROTO_VERSION = 31800;

export const MAINNET: NetworkParams = Object.freeze({
  network: "mainnet",
  magic: 0xd9b4bef9,
  defaultPort: 8333,
  minProtocolVersion: MIN_PEER_PROTO_VERSION,
  dnsSeeds: Object.freeze([
    "seed.bitcoin.sipa.be",
    "dnsseed.bluematt.me",
    "dnsseed.bitcoin.dashjr.org",
    "seed.bitcoinstats.com",
    "seed.bitcoin.jonasschnelli.ch",
    "seed.btc.petertodd.org",
    "seed.bitcoin.sprovoost.nl",
    "dnsseed.emzy.de",
    "seed.bitcoin.wiz.biz",
  ]),
});

export const TESTNET: NetworkParams = Object.freeze({
  network: "testnet",
  magic: 0x0709110b,
  defaultPort: 18333,
  minProtocolVersion: MIN_PEER_PROTO_VERSION,
  dnsSeeds: Object.freeze([
    "testnet-seed.bitcoin.jonasschnelli.ch",
    "seed.tbtc.petertodd.org",
    "seed.testnet.bitcoin.sprovoost.nl",
    "testnet-seed.bluematt.me",
  ]),
});

export const REGTEST: NetworkParams = Object.freeze({
  network: "regtest",
  magic: 0xdab5bffa,
  defaultPort: 18444,
  minProtocolVersion: MIN_PEER_PROTO_VERSION,
  dnsSeeds: Object.freeze([]),
});

export const SIGNET: NetworkParams = Object.freeze({
  network: "signet",
  magic: 0x40cf030a,
  defaultPort: 38333,
  minProtocolVersion: MIN_PEER_PROTO_VERSION,
  dnsSeeds: Object.freeze(["seed.signet.bitcoin.sprovoost.nl"]),
});

const NETWORKS: Record<Network, NetworkParams> = {
  mainnet: MAINNET,
  testnet: TESTNET,
  regtest: REGTEST,
  signet: SIGNET,
};

export function getNetworkParams(network: Network): NetworkParams {
  return NETWORKS[network];
}

// ============================================================================
// Peers
// ============================================================================

export interface PeerAddress {
  /** IPv4 dotted quad, IPv6 text, or a hostname */
  host: string;
  port: number;
}

export function formatPeer(peer: PeerAddress): string {
  return peer.host.includes(":") ? `[${peer.host}]:${peer.port}` : `${peer.host}:${peer.port}`;
}

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = "info" | "warn" | "error";

export type LogFn = (level: LogLevel, msg: string) => void;

export const noopLog: LogFn = () => {};
