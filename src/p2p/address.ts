/**
 * P2P Handshake — Network Address Serialization
 *
 * `net_addr` as it appears inside a version message (no timestamp prefix):
 *   services(8 LE) + IPv6 / IPv4-mapped address(16) + port(2 BE)
 */

import { isIPv4, isIPv6 } from "node:net";
import { HandshakeError, MalformedPayloadError } from "../errors.js";

// ============================================================================
// Types
// ============================================================================

export const NET_ADDR_SIZE = 26;

export interface NetworkAddress {
  readonly services: bigint;
  /** IPv4 dotted quad or IPv6 text */
  readonly ip: string;
  readonly port: number;
}

/** Build a frozen NetworkAddress, validating the IP literal and the port range */
export function createNetworkAddress(ip: string, port: number, services: bigint = 0n): NetworkAddress {
  if (!isIPv4(ip) && !isIPv6(ip)) {
    throw new HandshakeError("INVALID_ADDRESS", `not an IP address: ${ip}`);
  }
  if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
    throw new HandshakeError("INVALID_ADDRESS", `port out of range: ${port}`);
  }
  return Object.freeze({ services, ip, port });
}

// ============================================================================
// IP <-> 16 bytes
// ============================================================================

const IPV4_MAPPED_PREFIX = Buffer.from("00000000000000000000ffff", "hex");

/** Encode an IP literal as 16 bytes; IPv4 becomes ::ffff:a.b.c.d */
export function ipToBytes(ip: string): Buffer {
  if (isIPv4(ip)) {
    return Buffer.concat([IPV4_MAPPED_PREFIX, Buffer.from(ip.split(".").map(Number))]);
  }
  if (!isIPv6(ip)) {
    throw new HandshakeError("INVALID_ADDRESS", `not an IP address: ${ip}`);
  }

  // Drop a zone index such as %eth0
  let text = ip.split("%")[0];

  // Embedded IPv4 tail (::ffff:1.2.3.4) becomes two hex groups
  const lastColon = text.lastIndexOf(":");
  const tail = text.slice(lastColon + 1);
  if (tail.includes(".")) {
    const [a, b, c, d] = tail.split(".").map(Number);
    text = `${text.slice(0, lastColon + 1)}${((a << 8) | b).toString(16)}:${((c << 8) | d).toString(16)}`;
  }

  const [head, rest] = text.split("::");
  const headGroups = head ? head.split(":") : [];
  const tailGroups = rest === undefined ? [] : rest ? rest.split(":") : [];
  const fill = 8 - headGroups.length - tailGroups.length;
  const groups = [...headGroups, ...Array<string>(rest === undefined ? 0 : fill).fill("0"), ...tailGroups];

  const out = Buffer.alloc(16);
  groups.forEach((g, i) => out.writeUInt16BE(parseInt(g, 16), i * 2));
  return out;
}

/** Decode 16 address bytes; IPv4-mapped addresses come back as dotted quads */
export function bytesToIp(bytes: Buffer): string {
  if (bytes.length !== 16) {
    throw new MalformedPayloadError(`IP address needs 16 bytes, got ${bytes.length}`);
  }
  if (bytes.subarray(0, 12).equals(IPV4_MAPPED_PREFIX)) {
    return Array.from(bytes.subarray(12)).join(".");
  }

  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) groups.push(bytes.readUInt16BE(i));

  // RFC 5952: collapse the longest run (2+) of zero groups, leftmost on ties
  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && groups[j] === 0) j++;
    if (j - i > bestLen) {
      bestStart = i;
      bestLen = j - i;
    }
    i = j;
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLen < 2) return hex.join(":");
  const left = hex.slice(0, bestStart).join(":");
  const right = hex.slice(bestStart + bestLen).join(":");
  return `${left}::${right}`;
}

// ============================================================================
// net_addr
// ============================================================================

/** Serialize a network address for the version message */
export function serializeNetAddr(addr: NetworkAddress): Buffer {
  const buf = Buffer.alloc(NET_ADDR_SIZE);

  // Services (8 bytes LE)
  buf.writeBigUInt64LE(addr.services, 0);

  // Address (16 bytes)
  ipToBytes(addr.ip).copy(buf, 8);

  // Port (2 bytes BE — network byte order)
  buf.writeUInt16BE(addr.port, 24);

  return buf;
}

/** Read a 26-byte net_addr starting at `offset` */
export function parseNetAddr(data: Buffer, offset: number): NetworkAddress {
  if (offset + NET_ADDR_SIZE > data.length) {
    throw new MalformedPayloadError(`net_addr at offset ${offset} is truncated`);
  }
  return Object.freeze({
    services: data.readBigUInt64LE(offset),
    ip: bytesToIp(data.subarray(offset + 8, offset + 24)),
    port: data.readUInt16BE(offset + 24),
  });
}
