/**
 * P2P Handshake — Library Entry Point
 *
 * Wire codec, version/verack payloads, handshake state machine, transports,
 * DNS seed discovery and the handshake manager.
 */

export * from "./src/types.js";
export * from "./src/errors.js";
export { parseHandshakeConfig, DEFAULTS, HandshakeConfigSchema, type HandshakeConfig } from "./src/config.js";

export {
  HEADER_SIZE,
  MAX_PAYLOAD_SIZE,
  VERSION_COMMAND,
  VERACK_COMMAND,
  checksum,
  doubleSha256,
  encodeMessage,
  decodeMessage,
  parseHeader,
  encodeVarInt,
  decodeVarInt,
  encodeVarStr,
  type MessageHeader,
  type WireMessage,
} from "./src/p2p/protocol.js";
export {
  createNetworkAddress,
  serializeNetAddr,
  parseNetAddr,
  ipToBytes,
  bytesToIp,
  type NetworkAddress,
} from "./src/p2p/address.js";
export {
  buildVersionPayload,
  encodeVersionMessage,
  parseVersionPayload,
  generateNonce,
  VERSION_DEFAULTS,
  type VersionPayload,
  type VersionOptions,
} from "./src/p2p/version.js";
export { buildVerackPayload, encodeVerackMessage, isVerack } from "./src/p2p/verack.js";
export {
  performHandshake,
  describeFailure,
  toFailedError,
  HandshakeSession,
  type HandshakeOptions,
  type HandshakeOutcome,
  type HandshakeSuccess,
  type HandshakeFailure,
  type HandshakeStage,
  type HandshakeState,
  type HandshakeEvent,
} from "./src/p2p/handshake.js";
export { connect, createMemoryPair, StreamByteStream, type ByteStream } from "./src/p2p/stream.js";
export {
  discoverPeers,
  resolveSeed,
  getDnsSeeds,
  dnsSeedAt,
  parsePeerAddress,
  type DnsResolver,
  type DiscoverOptions,
} from "./src/p2p/peers.js";
export {
  HandshakeManager,
  type Connector,
  type HandshakeRecord,
  type HandshakeManagerOptions,
  type FirstSuccessResult,
} from "./src/manager.js";
export { runCli, type CliIO } from "./src/cli.js";
