/**
 * AES-256-GCM with a detached tag.
 *
 * libsodium's AES-GCM is unavailable in the wasm build, so the AEAD runs
 * on node:crypto. Ciphertext, nonce and tag are kept as separate fields
 * end to end; they are never concatenated on the wire.
 *
 * @module cipher
 */
import {
  createCipheriv,
  createDecipheriv,
  randomBytes,
} from "node:crypto";
import { AuthenticationFailedError, KeyFormatError } from "./errors.js";

const ALGORITHM = "aes-256-gcm";
export const SYMMETRIC_KEY_BYTES = 32;
export const NONCE_BYTES = 12;
export const TAG_BYTES = 16;
/** The backend's reply path uses 128-bit IVs; outgoing nonces are always 96-bit. */
const ACCEPTED_NONCE_BYTES: readonly number[] = [NONCE_BYTES, 16];

/** One AEAD output. */
export interface SealedBox {
  ciphertext: Uint8Array;
  nonce: Uint8Array;
  tag: Uint8Array;
}

function assertKey(key: Uint8Array): void {
  if (key.length !== SYMMETRIC_KEY_BYTES) {
    throw new KeyFormatError(
      `Symmetric key must be ${SYMMETRIC_KEY_BYTES} bytes, got ${key.length}`,
      "key",
    );
  }
}

/** Fresh random 256-bit key. */
export function generateSymmetricKey(): Uint8Array {
  return new Uint8Array(randomBytes(SYMMETRIC_KEY_BYTES));
}

/**
 * Encrypt bytes under a 256-bit key. Every call draws a new 96-bit nonce.
 */
export async function sealBytes(
  plaintext: Uint8Array,
  key: Uint8Array,
  aad?: Uint8Array,
): Promise<SealedBox> {
  assertKey(key);
  const nonce = new Uint8Array(randomBytes(NONCE_BYTES));
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_BYTES });
  if (aad) cipher.setAAD(aad);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return {
    ciphertext: new Uint8Array(ciphertext),
    nonce,
    tag: new Uint8Array(cipher.getAuthTag()),
  };
}

/**
 * Decrypt and authenticate. Fails closed: a wrong key or any altered byte
 * of ciphertext, nonce or tag raises {@link AuthenticationFailedError}.
 */
export async function openBytes(
  box: SealedBox,
  key: Uint8Array,
  aad?: Uint8Array,
): Promise<Uint8Array> {
  assertKey(key);
  if (!ACCEPTED_NONCE_BYTES.includes(box.nonce.length)) {
    throw new AuthenticationFailedError(`Unexpected nonce length ${box.nonce.length}`);
  }
  if (box.tag.length !== TAG_BYTES) {
    throw new AuthenticationFailedError(`Tag must be ${TAG_BYTES} bytes`);
  }
  try {
    const decipher = createDecipheriv(ALGORITHM, key, box.nonce, {
      authTagLength: TAG_BYTES,
    });
    decipher.setAuthTag(box.tag);
    if (aad) decipher.setAAD(aad);
    const plaintext = Buffer.concat([decipher.update(box.ciphertext), decipher.final()]);
    return new Uint8Array(plaintext);
  } catch (err) {
    throw new AuthenticationFailedError(undefined, { cause: err });
  }
}

/** UTF-8 convenience over {@link sealBytes}. */
export async function encryptSymmetric(
  plaintext: string,
  key: Uint8Array,
): Promise<SealedBox> {
  return sealBytes(new TextEncoder().encode(plaintext), key);
}

/** UTF-8 convenience over {@link openBytes}. */
export async function decryptSymmetric(
  box: SealedBox,
  key: Uint8Array,
): Promise<string> {
  const bytes = await openBytes(box, key);
  return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
}
