/**
 * P2P Handshake — Version Message
 *
 * Fields:
 *   int32_t     version
 *   uint64_t    services
 *   int64_t     timestamp
 *   net_addr    addr_recv  (26 bytes, no timestamp prefix in version msg)
 *   net_addr    addr_from  (26 bytes)
 *   uint64_t    nonce
 *   var_str     user_agent
 *   int32_t     start_height
 *   bool        relay
 *
 * Everything after the nonce may be missing when talking to old or minimal
 * peers. Parsing stops at the first field boundary where the buffer ends and
 * fills in defaults for the rest; a field that starts but does not finish is
 * malformed.
 */

import { randomBytes } from "node:crypto";
import { MalformedPayloadError } from "../errors.js";
import type { NetworkParams } from "../types.js";
import { NET_ADDR_SIZE, parseNetAddr, serializeNetAddr, type NetworkAddress } from "./address.js";
import { VERSION_COMMAND, decodeVarInt, encodeMessage, encodeVarStr } from "./protocol.js";

// ============================================================================
// Types
// ============================================================================

export interface VersionPayload {
  version: number;
  services: bigint;
  /** Seconds since epoch */
  timestamp: bigint;
  addrRecv: NetworkAddress;
  addrFrom: NetworkAddress;
  nonce: bigint;
  userAgent: string;
  startHeight: number;
  relay: boolean;
}

export interface VersionOptions {
  version: number;
  services: bigint;
  /** The address of the peer we are contacting */
  addrRecv: NetworkAddress;
  /** Our own address; 0.0.0.0:0 is customary */
  addrFrom: NetworkAddress;
  userAgent: string;
  startHeight: number;
  relay: boolean;
  /** Defaults to the current time */
  timestamp?: bigint;
}

/** version(4) + services(8) + timestamp(8) + 2 × net_addr(26) + nonce(8) */
export const VERSION_FIXED_SIZE = 4 + 8 + 8 + NET_ADDR_SIZE * 2 + 8;

/** Values for trailing fields a peer left out */
export const VERSION_DEFAULTS: Readonly<Pick<VersionPayload, "userAgent" | "startHeight" | "relay">> = Object.freeze({
  userAgent: "",
  startHeight: 0,
  relay: true,
});

// ============================================================================
// Build
// ============================================================================

/** A fresh random 64-bit nonce, used to detect connections to ourselves */
export function generateNonce(): bigint {
  return randomBytes(8).readBigUInt64LE(0);
}

/**
 * Serialize a `version` payload. A new nonce is drawn on every call and
 * returned alongside the bytes.
 */
export function buildVersionPayload(options: VersionOptions): { payload: Buffer; nonce: bigint } {
  const nonce = generateNonce();
  const timestamp = options.timestamp ?? BigInt(Math.floor(Date.now() / 1000));

  const head = Buffer.alloc(20);
  // Protocol version (4 bytes LE)
  head.writeInt32LE(options.version, 0);
  // Services (8 bytes LE)
  head.writeBigUInt64LE(options.services, 4);
  // Timestamp (8 bytes LE, signed)
  head.writeBigInt64LE(timestamp, 12);

  const nonceBuf = Buffer.alloc(8);
  nonceBuf.writeBigUInt64LE(nonce, 0);

  const heightBuf = Buffer.alloc(4);
  heightBuf.writeInt32LE(options.startHeight, 0);

  const payload = Buffer.concat([
    head,
    serializeNetAddr(options.addrRecv),
    serializeNetAddr(options.addrFrom),
    nonceBuf,
    encodeVarStr(options.userAgent),
    heightBuf,
    Buffer.from([options.relay ? 0x01 : 0x00]),
  ]);

  return { payload, nonce };
}

/** Build a framed `version` message */
export function encodeVersionMessage(
  options: VersionOptions,
  params: NetworkParams,
): { message: Buffer; nonce: bigint } {
  const { payload, nonce } = buildVersionPayload(options);
  return { message: encodeMessage(VERSION_COMMAND, payload, params), nonce };
}

// ============================================================================
// Parse
// ============================================================================

export function parseVersionPayload(data: Buffer): VersionPayload {
  if (data.length < VERSION_FIXED_SIZE) {
    throw new MalformedPayloadError(
      `version payload is ${data.length} bytes, needs at least ${VERSION_FIXED_SIZE}`,
    );
  }

  const version = data.readInt32LE(0);
  const services = data.readBigUInt64LE(4);
  const timestamp = data.readBigInt64LE(12);
  const addrRecv = parseNetAddr(data, 20);
  const addrFrom = parseNetAddr(data, 20 + NET_ADDR_SIZE);
  const nonce = data.readBigUInt64LE(20 + NET_ADDR_SIZE * 2);

  let offset = VERSION_FIXED_SIZE;
  let { userAgent, startHeight, relay } = VERSION_DEFAULTS;

  if (offset < data.length) {
    const { value: length, size } = decodeVarInt(data, offset);
    offset += size;
    if (offset + length > data.length) {
      throw new MalformedPayloadError(
        `user agent declares ${length} bytes but only ${data.length - offset} remain`,
      );
    }
    userAgent = data.subarray(offset, offset + length).toString("utf8");
    offset += length;
  }

  if (offset < data.length) {
    if (offset + 4 > data.length) {
      throw new MalformedPayloadError(`start height is truncated at offset ${offset}`);
    }
    startHeight = data.readInt32LE(offset);
    offset += 4;
  }

  if (offset < data.length) {
    relay = data.readUInt8(offset) !== 0;
  }

  return { version, services, timestamp, addrRecv, addrFrom, nonce, userAgent, startHeight, relay };
}
