/**
 * Request wire format: one unsigned 32-bit little-endian integer per request.
 */

import { BarlineError } from "../errors.js";

export const REQUEST_BYTES = 4;
export const MAX_REQUEST_ID = 0xffff_ffff;

export function isRequestId(v: number): boolean {
  return Number.isInteger(v) && v >= 0 && v <= MAX_REQUEST_ID;
}

export function encodeRequest(id: number): Uint8Array {
  if (!isRequestId(id)) {
    throw new BarlineError("BARLINE_INVALID_REQUEST", `request id must be a uint32: ${String(id)}`);
  }
  const out = new Uint8Array(REQUEST_BYTES);
  new DataView(out.buffer).setUint32(0, id, true);
  return out;
}

/**
 * Decode the first four bytes. Returns null for a short payload; trailing
 * bytes are ignored.
 */
export function decodeRequest(bytes: Uint8Array): number | null {
  if (bytes.length < REQUEST_BYTES) return null;
  return new DataView(bytes.buffer, bytes.byteOffset, REQUEST_BYTES).getUint32(0, true);
}

/** Parse a decimal request id as typed on a command line. */
export function parseRequestId(text: string): number | null {
  if (!/^[0-9]+$/.test(text)) return null;
  const n = Number.parseInt(text, 10);
  return isRequestId(n) ? n : null;
}
