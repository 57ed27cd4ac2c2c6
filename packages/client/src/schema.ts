/**
 * Zod schemas for every JSON document that crosses the client boundary:
 * backend responses, wire envelopes, legacy key exports and seed backups.
 * @module schema
 */
import { ARGON2_MAX_MEM_LIMIT, ARGON2_MAX_OPS_LIMIT } from "@otto/crypto";
import { z } from "zod";

const base64Pattern = /^[A-Za-z0-9+/]*={0,2}$/;
const base64String = z.string().regex(base64Pattern, "Invalid base64 string");
const pemString = z.string().min(1).includes("-----BEGIN ");

// --- GET /users/server-public-key ---
export const serverPublicKeyResponseSchema = z.object({
  public_key: pemString,
});

// --- Encrypted message (legacy field names) ---
export const wireEnvelopeSchema = z.object({
  encrypted_content: base64String,
  encrypted_key: base64String.min(1).optional(),
  iv: base64String.min(1),
  tag: base64String.min(1),
});

// --- Legacy RSA identity export (QR / clipboard) ---
export const LEGACY_EXPORT_TYPE = "otto_e2ee_keypair";

export const legacyKeyExportSchema = z.object({
  version: z.literal(1),
  type: z.literal(LEGACY_EXPORT_TYPE),
  private_key_pem: pemString,
  public_key_pem: pemString,
});

export type LegacyKeyExport = z.infer<typeof legacyKeyExportSchema>;

// --- Passphrase-encrypted seed backup ---
export const seedBackupSchema = z.object({
  version: z.number().int().positive(),
  kdf: z.object({
    type: z.literal("argon2id"),
    salt: base64String.min(1),
    opsLimit: z.number().int().positive().max(ARGON2_MAX_OPS_LIMIT),
    memLimit: z.number().int().positive().max(ARGON2_MAX_MEM_LIMIT),
  }),
  nonce: base64String.min(1),
  tag: base64String.min(1),
  ciphertext: base64String.min(1),
});
