/**
 * P2P Handshake — Verack Message
 *
 * The acknowledgment carries no payload; the command name is all there is.
 */

import type { NetworkParams } from "../types.js";
import { VERACK_COMMAND, encodeMessage } from "./protocol.js";

export function buildVerackPayload(): Buffer {
  return Buffer.alloc(0);
}

export function isVerack(command: string): boolean {
  return command === VERACK_COMMAND;
}

/** Build a framed `verack` message (empty payload) */
export function encodeVerackMessage(params: NetworkParams): Buffer {
  return encodeMessage(VERACK_COMMAND, buildVerackPayload(), params);
}
