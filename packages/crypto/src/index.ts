/**
 * @otto/crypto: primitives for the Otto E2EE subsystem.
 *
 * - Seed identities (Ed25519) and signatures
 * - X25519 agreement mapped from the same seed
 * - HKDF-SHA256 conversation keys
 * - AES-256-GCM with detached tags
 * - BIP-39 recovery phrases and QR seed transfer
 * - RSA PEM codec (SPKI / PKCS#1 / PKCS#8) and RSA-OAEP key wrapping
 * - Hybrid message envelopes
 * - Argon2id seed backups
 */

// --- Core ---
export { initSodium } from "./sodium.js";
export { toBase64, fromBase64, toHex, fromHex, bytesEqual } from "./encoding.js";
export {
  E2eeError,
  KeyFormatError,
  KeysUnavailableError,
  InvalidMnemonicError,
  AuthenticationFailedError,
  ServerKeyUnavailableError,
  FetchTimeoutError,
  isRetryable,
} from "./errors.js";

// --- Identity ---
export {
  IDENTITY_SEED_BYTES,
  IDENTITY_PUBLIC_KEY_BYTES,
  SIGNATURE_BYTES,
  assertSeed,
  generateIdentitySeed,
  deriveIdentityKeypair,
  signDetached,
  verifySignature,
} from "./identity.js";
export type { IdentityKeypair } from "./identity.js";

// --- Key agreement ---
export {
  toAgreementKeypair,
  toAgreementPublicKey,
  deriveSharedSecret,
} from "./agreement.js";
export type { AgreementKeypair } from "./agreement.js";
export { hkdfSha256, deriveConversationKey, CONVERSATION_KEY_BYTES } from "./kdf.js";

// --- Symmetric cipher ---
export {
  SYMMETRIC_KEY_BYTES,
  NONCE_BYTES,
  TAG_BYTES,
  generateSymmetricKey,
  sealBytes,
  openBytes,
  encryptSymmetric,
  decryptSymmetric,
} from "./cipher.js";
export type { SealedBox } from "./cipher.js";

// --- Mnemonic / QR transfer ---
export {
  MNEMONIC_WORD_COUNT,
  normalizeMnemonic,
  mnemonicFromSeed,
  seedFromMnemonic,
  isValidMnemonic,
} from "./mnemonic.js";
export {
  QR_FRAME_PREFIX,
  QR_FRAME_COUNT,
  seedChecksum,
  seedToQrFrames,
  QrFrameAssembler,
} from "./qr-frames.js";
export type { FrameProgress } from "./qr-frames.js";

// --- RSA codec ---
export {
  bigIntToBytes,
  bytesToBigInt,
  bigIntToUnsignedBytes,
  unsignedBytesToBigInt,
} from "./asn1.js";
export {
  RSA_ENCRYPTION_OID,
  modInverse,
  withCrtParams,
  publicPart,
  publicKeysEqual,
  encodeRsaPublicKeyDer,
  encodeRsaPrivateKeyDer,
  encodePublicKeyPEM,
  decodePublicKeyPEM,
  encodePrivateKeyPEM,
  decodePrivateKeyPEM,
} from "./key-codec.js";
export type { RsaPublicKey, RsaPrivateKey, CompleteRsaPrivateKey } from "./key-codec.js";
export {
  LEGACY_RSA_BITS,
  generateLegacyRsaKeypair,
  fromPrivateKeyObject,
  rsaOaepEncrypt,
  rsaOaepDecrypt,
  loadPrivateKeyPEM,
} from "./rsa.js";

// --- Envelopes ---
export {
  envelopeToWire,
  envelopeFromWire,
  sealHybridEnvelope,
  openHybridEnvelope,
} from "./envelope.js";
export type { EncryptedEnvelope, WireEnvelope } from "./envelope.js";

// --- Backup ---
export {
  SEED_BACKUP_VERSION,
  ARGON2_MAX_OPS_LIMIT,
  ARGON2_MAX_MEM_LIMIT,
  createSeedBackup,
  restoreSeedBackup,
} from "./backup.js";
export type { Argon2Params, SeedBackupPayload } from "./backup.js";
