/**
 * X25519 key agreement from Ed25519 identities.
 *
 * Signing keys are mapped onto Curve25519 with the birational map of
 * RFC 7748 section 4.1 (u = (1 + y) / (1 - y)), as implemented by
 * libsodium's crypto_sign_ed25519_pk_to_curve25519 and, for the secret
 * side, crypto_sign_ed25519_sk_to_curve25519 (clamped SHA-512 of the
 * seed). The agreement key therefore traces to the same seed as the
 * signing key.
 *
 * @module agreement
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium } from "./sodium.js";
import { KeyFormatError } from "./errors.js";
import { assertSeed, IDENTITY_PUBLIC_KEY_BYTES } from "./identity.js";

export interface AgreementKeypair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

/** Map an identity seed to its X25519 keypair. */
export async function toAgreementKeypair(
  seed: Uint8Array,
): Promise<AgreementKeypair> {
  await initSodium();
  assertSeed(seed);
  const signing = sodium.crypto_sign_seed_keypair(seed);
  const privateKey = sodium.crypto_sign_ed25519_sk_to_curve25519(signing.privateKey);
  const publicKey = sodium.crypto_sign_ed25519_pk_to_curve25519(signing.publicKey);
  sodium.memzero(signing.privateKey);
  return { publicKey, privateKey };
}

/** Map a remote Ed25519 public key to its X25519 public key. */
export async function toAgreementPublicKey(
  signingPublicKey: Uint8Array,
): Promise<Uint8Array> {
  await initSodium();
  if (signingPublicKey.length !== IDENTITY_PUBLIC_KEY_BYTES) {
    throw new KeyFormatError(
      `Remote public key must be ${IDENTITY_PUBLIC_KEY_BYTES} bytes, got ${signingPublicKey.length}`,
      "publicKey",
    );
  }
  try {
    return sodium.crypto_sign_ed25519_pk_to_curve25519(signingPublicKey);
  } catch (err) {
    throw new KeyFormatError("Remote public key is not a valid Ed25519 point", "publicKey", {
      cause: err,
    });
  }
}

/**
 * Raw X25519 shared secret between a local seed and a remote Ed25519
 * public key. Symmetric: derive(A, pub(B)) == derive(B, pub(A)).
 * This is NOT a usable key; pass it through deriveConversationKey.
 */
export async function deriveSharedSecret(
  localSeed: Uint8Array,
  remotePublicKey: Uint8Array,
): Promise<Uint8Array> {
  const remote = await toAgreementPublicKey(remotePublicKey);
  const local = await toAgreementKeypair(localSeed);
  try {
    return sodium.crypto_scalarmult(local.privateKey, remote);
  } catch (err) {
    // libsodium rejects low-order points that yield an all-zero secret.
    throw new KeyFormatError("Remote public key yields a degenerate shared secret", "publicKey", {
      cause: err,
    });
  } finally {
    sodium.memzero(local.privateKey);
  }
}
