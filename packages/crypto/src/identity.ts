/**
 * Seed-based Ed25519 identities.
 *
 * A single 32-byte seed is the root secret: the signing keypair is derived
 * from it here, and the X25519 agreement key is mapped from the same seed
 * in agreement.ts. Only the seed is ever persisted.
 *
 * @module identity
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium } from "./sodium.js";
import { KeyFormatError } from "./errors.js";

export const IDENTITY_SEED_BYTES = 32;
export const IDENTITY_PUBLIC_KEY_BYTES = 32;
export const SIGNATURE_BYTES = 64;

export interface IdentityKeypair {
  /** Ed25519 public key. */
  publicKey: Uint8Array;
  /** libsodium secret key (seed || public key). */
  privateKey: Uint8Array;
  /** The seed the pair was derived from. */
  seed: Uint8Array;
}

export function assertSeed(seed: Uint8Array): void {
  if (seed.length !== IDENTITY_SEED_BYTES) {
    throw new KeyFormatError(
      `Identity seed must be ${IDENTITY_SEED_BYTES} bytes, got ${seed.length}`,
      "seed",
    );
  }
}

/** Draw a fresh random identity seed. */
export async function generateIdentitySeed(): Promise<Uint8Array> {
  await initSodium();
  return sodium.randombytes_buf(IDENTITY_SEED_BYTES);
}

/**
 * Derive the Ed25519 keypair for a seed. Deterministic: the same seed
 * always yields the same public key.
 */
export async function deriveIdentityKeypair(
  seed: Uint8Array,
): Promise<IdentityKeypair> {
  await initSodium();
  assertSeed(seed);
  const kp = sodium.crypto_sign_seed_keypair(seed);
  return {
    publicKey: kp.publicKey,
    privateKey: kp.privateKey,
    seed: Uint8Array.from(seed),
  };
}

export async function signDetached(
  data: Uint8Array,
  keypair: IdentityKeypair,
): Promise<Uint8Array> {
  await initSodium();
  return sodium.crypto_sign_detached(data, keypair.privateKey);
}

/** Returns false (never throws) for a bad signature or malformed key. */
export async function verifySignature(
  signature: Uint8Array,
  data: Uint8Array,
  publicKey: Uint8Array,
): Promise<boolean> {
  await initSodium();
  if (
    signature.length !== SIGNATURE_BYTES ||
    publicKey.length !== IDENTITY_PUBLIC_KEY_BYTES
  ) {
    return false;
  }
  try {
    return sodium.crypto_sign_verify_detached(signature, data, publicKey);
  } catch {
    return false;
  }
}
