/**
 * Base64 and hex codecs. Base64 uses the standard alphabet with padding,
 * which is what the backend and the PEM bodies expect.
 * @module encoding
 */
import sodium from "libsodium-wrappers-sumo";
import { KeyFormatError } from "./errors.js";

// The codecs are synchronous and reachable from the synchronous PEM API,
// so the wasm module must be loaded before this module finishes evaluating.
await sodium.ready;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

export function toBase64(data: Uint8Array): string {
  return sodium.to_base64(data, sodium.base64_variants.ORIGINAL);
}

/**
 * Decode standard base64.
 * @param field - Reported on the thrown {@link KeyFormatError}.
 */
export function fromBase64(encoded: string, field = "base64"): Uint8Array {
  if (!BASE64_PATTERN.test(encoded) || encoded.length % 4 !== 0) {
    throw new KeyFormatError(`Invalid base64 in ${field}`, field);
  }
  if (encoded.length === 0) return new Uint8Array(0);
  return sodium.from_base64(encoded, sodium.base64_variants.ORIGINAL);
}

export function toHex(data: Uint8Array): string {
  return sodium.to_hex(data);
}

export function fromHex(encoded: string, field = "hex"): Uint8Array {
  if (!HEX_PATTERN.test(encoded)) {
    throw new KeyFormatError(`Invalid hex in ${field}`, field);
  }
  if (encoded.length === 0) return new Uint8Array(0);
  return sodium.from_hex(encoded);
}

/** Constant-time equality; false on length mismatch. */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && sodium.memcmp(a, b);
}
