/**
 * HKDF-SHA256 (RFC 5869) on top of libsodium's HMAC-SHA-256, and the
 * conversation key derivation built on it.
 *
 * @module kdf
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium } from "./sodium.js";

export const CONVERSATION_KEY_BYTES = 32;
const HASH_BYTES = 32;
const CONVERSATION_INFO_PREFIX = "otto-conversation-key:";

/**
 * HMAC-SHA256 with a key of any length. The one-shot
 * `crypto_auth_hmacsha256` only takes 32-byte keys; the streaming API
 * hashes longer keys and pads shorter ones as RFC 2104 specifies.
 */
function hmacSha256(key: Uint8Array, message: Uint8Array): Uint8Array {
  const state = sodium.crypto_auth_hmacsha256_init(key);
  sodium.crypto_auth_hmacsha256_update(state, message);
  return sodium.crypto_auth_hmacsha256_final(state);
}

/**
 * HKDF-Extract: PRK = HMAC-SHA256(salt, IKM)
 */
function hkdfExtract(salt: Uint8Array, ikm: Uint8Array): Uint8Array {
  return hmacSha256(salt, ikm);
}

/**
 * HKDF-Expand: OKM = T(1) || T(2) || ... truncated to length bytes
 * T(i) = HMAC-SHA256(PRK, T(i-1) || info || i)
 */
function hkdfExpand(
  prk: Uint8Array,
  info: Uint8Array,
  length: number,
): Uint8Array {
  const n = Math.ceil(length / HASH_BYTES);
  const okm = new Uint8Array(n * HASH_BYTES);
  let prev = new Uint8Array(0);

  for (let i = 1; i <= n; i++) {
    const input = new Uint8Array(prev.length + info.length + 1);
    input.set(prev, 0);
    input.set(info, prev.length);
    input[input.length - 1] = i;
    prev = new Uint8Array(hmacSha256(prk, input));
    okm.set(prev, (i - 1) * HASH_BYTES);
  }

  return okm.slice(0, length);
}

export async function hkdfSha256(
  ikm: Uint8Array,
  salt: Uint8Array,
  info: Uint8Array,
  length: number,
): Promise<Uint8Array> {
  await initSodium();
  if (length <= 0 || length > 255 * HASH_BYTES) {
    throw new RangeError(`HKDF output length out of range: ${length}`);
  }
  // An empty salt is equivalent to HashLen zero bytes.
  const prk = hkdfExtract(salt.length > 0 ? salt : new Uint8Array(HASH_BYTES), ikm);
  const okm = hkdfExpand(prk, info, length);
  sodium.memzero(prk);
  return okm;
}

/**
 * Turn a raw X25519 shared secret into the AES-256 key for one
 * conversation. Both peers get the same key for the same conversation id.
 */
export async function deriveConversationKey(
  sharedSecret: Uint8Array,
  conversationId: string,
): Promise<Uint8Array> {
  const info = new TextEncoder().encode(CONVERSATION_INFO_PREFIX + conversationId);
  return hkdfSha256(sharedSecret, new Uint8Array(HASH_BYTES), info, CONVERSATION_KEY_BYTES);
}
