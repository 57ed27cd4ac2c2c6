/**
 * What the key store holds for this installation, as a tagged union over
 * the two key schemes that have shipped:
 *
 *   seed        current scheme, a 32-byte Ed25519/X25519 seed stored as hex
 *   legacy-rsa  RSA-2048 PEM pair from before the seed scheme
 *
 * @module stored-identity
 */
import {
  decodePublicKeyPEM,
  fromHex,
  IDENTITY_SEED_BYTES,
  KeyFormatError,
  initSodium,
  loadPrivateKeyPEM,
  publicKeysEqual,
  publicPart,
  type CompleteRsaPrivateKey,
} from "@otto/crypto";
import { StorageKeys, type SecureKeyStore } from "./secure-store.js";

export interface LegacyRsaIdentity {
  scheme: "legacy-rsa";
  privateKey: CompleteRsaPrivateKey;
  privateKeyPem: string;
  publicKeyPem: string;
}

export type StoredIdentity =
  | { kind: "seed"; seed: Uint8Array; legacy: LegacyRsaIdentity | null }
  | { kind: "legacy-rsa"; legacy: LegacyRsaIdentity; discardedSeed: boolean }
  | { kind: "none"; discardedSeed: boolean };

/** Hex seed of exactly 32 bytes, else null. */
export function parseSeedHex(hex: string): Uint8Array | null {
  if (hex.length !== IDENTITY_SEED_BYTES * 2) return null;
  try {
    return fromHex(hex);
  } catch (err) {
    if (err instanceof KeyFormatError) return null;
    throw err;
  }
}

/**
 * Decode a legacy PEM pair and check that the public half belongs to the
 * private half.
 */
export function parseLegacyIdentity(
  privateKeyPem: string,
  publicKeyPem: string,
): LegacyRsaIdentity {
  const privateKey = loadPrivateKeyPEM(privateKeyPem);
  const publicKey = decodePublicKeyPEM(publicKeyPem);
  if (!publicKeysEqual(publicPart(privateKey), publicKey)) {
    throw new KeyFormatError("Public key does not match the private key", "public_key_pem");
  }
  return { scheme: "legacy-rsa", privateKey, privateKeyPem, publicKeyPem };
}

async function readLegacy(store: SecureKeyStore): Promise<LegacyRsaIdentity | null> {
  const privateKeyPem = await store.readText(StorageKeys.LEGACY_PRIVATE_KEY_PEM);
  const publicKeyPem = await store.readText(StorageKeys.LEGACY_PUBLIC_KEY_PEM);
  if (!privateKeyPem || !publicKeyPem) return null;
  try {
    return parseLegacyIdentity(privateKeyPem, publicKeyPem);
  } catch (err) {
    // An undecodable legacy pair cannot be migrated; treat it as absent.
    if (err instanceof KeyFormatError) return null;
    throw err;
  }
}

/**
 * Inspect storage. A seed that is present but malformed is reported
 * through `discardedSeed` so the caller can delete it.
 */
export async function detectStoredIdentity(store: SecureKeyStore): Promise<StoredIdentity> {
  await initSodium();
  const seedHex = await store.readText(StorageKeys.IDENTITY_SEED_HEX);
  const seed = seedHex ? parseSeedHex(seedHex) : null;
  const legacy = await readLegacy(store);

  if (seed) return { kind: "seed", seed, legacy };

  const discardedSeed = Boolean(seedHex);
  if (legacy) return { kind: "legacy-rsa", legacy, discardedSeed };
  return { kind: "none", discardedSeed };
}
