/**
 * Passphrase-encrypted identity seed backup: Argon2id key derivation and
 * AES-256-GCM.
 *
 * The payload is safe to hand to untrusted storage (the backend or a
 * file); only the passphrase opens it.
 *
 * @module backup
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium } from "./sodium.js";
import { fromBase64, toBase64 } from "./encoding.js";
import { openBytes, sealBytes, SYMMETRIC_KEY_BYTES } from "./cipher.js";
import { assertSeed } from "./identity.js";
import { KeyFormatError } from "./errors.js";

// Argon2id defaults used by the export screen (64 MiB, 2 passes)
const ARGON2_OPS_LIMIT = 2;
const ARGON2_MEM_LIMIT = 64 * 1024 * 1024;
const ARGON2_SALT_BYTES = 16;
const MIN_PASSPHRASE_LENGTH = 8;

/** Upper bounds on the cost a backup payload may ask for. */
export const ARGON2_MAX_OPS_LIMIT = 16;
export const ARGON2_MAX_MEM_LIMIT = 1024 * 1024 * 1024;

export const SEED_BACKUP_VERSION = 1;

export interface Argon2Params {
  opsLimit: number;
  /** Bytes. */
  memLimit: number;
}

export interface SeedBackupPayload {
  version: number;
  kdf: {
    type: "argon2id";
    salt: string; // base64
    opsLimit: number;
    memLimit: number;
  };
  nonce: string; // base64
  tag: string; // base64
  ciphertext: string; // base64
}

function checkArgon2Params(params: Argon2Params): void {
  const { opsLimit, memLimit } = params;
  if (
    !Number.isInteger(opsLimit) ||
    opsLimit < sodium.crypto_pwhash_OPSLIMIT_MIN ||
    opsLimit > ARGON2_MAX_OPS_LIMIT
  ) {
    throw new KeyFormatError(`Argon2 opsLimit out of range: ${opsLimit}`, "opsLimit");
  }
  if (
    !Number.isInteger(memLimit) ||
    memLimit < sodium.crypto_pwhash_MEMLIMIT_MIN ||
    memLimit > ARGON2_MAX_MEM_LIMIT
  ) {
    throw new KeyFormatError(`Argon2 memLimit out of range: ${memLimit}`, "memLimit");
  }
}

async function deriveBackupKey(
  passphrase: string,
  salt: Uint8Array,
  params: Argon2Params,
): Promise<Uint8Array> {
  await initSodium();
  checkArgon2Params(params);
  return sodium.crypto_pwhash(
    SYMMETRIC_KEY_BYTES,
    passphrase,
    salt,
    params.opsLimit,
    params.memLimit,
    sodium.crypto_pwhash_ALG_ARGON2ID13,
  );
}

/**
 * Encrypt an identity seed under a passphrase.
 * @param params - Argon2id cost; defaults to 2 passes over 64 MiB.
 */
export async function createSeedBackup(
  seed: Uint8Array,
  passphrase: string,
  params: Argon2Params = { opsLimit: ARGON2_OPS_LIMIT, memLimit: ARGON2_MEM_LIMIT },
): Promise<SeedBackupPayload> {
  await initSodium();
  assertSeed(seed);

  if (passphrase.length < MIN_PASSPHRASE_LENGTH) {
    throw new RangeError(`Passphrase must be at least ${MIN_PASSPHRASE_LENGTH} characters`);
  }

  const salt = sodium.randombytes_buf(ARGON2_SALT_BYTES);
  const key = await deriveBackupKey(passphrase, salt, params);

  try {
    const box = await sealBytes(seed, key);
    return {
      version: SEED_BACKUP_VERSION,
      kdf: {
        type: "argon2id",
        salt: toBase64(salt),
        opsLimit: params.opsLimit,
        memLimit: params.memLimit,
      },
      nonce: toBase64(box.nonce),
      tag: toBase64(box.tag),
      ciphertext: toBase64(box.ciphertext),
    };
  } finally {
    sodium.memzero(key);
  }
}

/**
 * Recover the seed from a backup.
 * @throws AuthenticationFailedError on a wrong passphrase or corrupted payload.
 */
export async function restoreSeedBackup(
  payload: SeedBackupPayload,
  passphrase: string,
): Promise<Uint8Array> {
  await initSodium();

  if (payload.version !== SEED_BACKUP_VERSION) {
    throw new KeyFormatError(`Unsupported backup version: ${payload.version}`, "version");
  }

  const salt = fromBase64(payload.kdf.salt, "salt");
  if (salt.length !== ARGON2_SALT_BYTES) {
    throw new KeyFormatError("Backup salt has the wrong length", "salt");
  }
  const key = await deriveBackupKey(passphrase, salt, payload.kdf);

  try {
    const seed = await openBytes(
      {
        nonce: fromBase64(payload.nonce, "nonce"),
        tag: fromBase64(payload.tag, "tag"),
        ciphertext: fromBase64(payload.ciphertext, "ciphertext"),
      },
      key,
    );
    assertSeed(seed);
    return seed;
  } finally {
    sodium.memzero(key);
  }
}
