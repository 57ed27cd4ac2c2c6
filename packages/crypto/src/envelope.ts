/**
 * Hybrid message envelope: AES-256-GCM over the content, the AES key
 * wrapped with RSA-OAEP for the party that must read it (the backend, or
 * a legacy RSA identity on the reply path).
 *
 * Wire format (JSON, base64 fields, legacy names):
 *   { encrypted_content, encrypted_key?, iv, tag }
 *
 * @module envelope
 */
import { decryptSymmetric, encryptSymmetric, type SealedBox } from "./cipher.js";
import { rsaOaepDecrypt, rsaOaepEncrypt } from "./rsa.js";
import type { RsaPrivateKey, RsaPublicKey } from "./key-codec.js";
import { fromBase64, toBase64 } from "./encoding.js";
import { KeyFormatError } from "./errors.js";

/** Decoded envelope. `encryptedKey` is absent on the symmetric-only path. */
export interface EncryptedEnvelope extends SealedBox {
  encryptedKey?: Uint8Array;
}

/** Envelope as it crosses the network. */
export interface WireEnvelope {
  encrypted_content: string;
  encrypted_key?: string;
  iv: string;
  tag: string;
}

export function envelopeToWire(envelope: EncryptedEnvelope): WireEnvelope {
  const wire: WireEnvelope = {
    encrypted_content: toBase64(envelope.ciphertext),
    iv: toBase64(envelope.nonce),
    tag: toBase64(envelope.tag),
  };
  if (envelope.encryptedKey) wire.encrypted_key = toBase64(envelope.encryptedKey);
  return wire;
}

export function envelopeFromWire(wire: WireEnvelope): EncryptedEnvelope {
  const envelope: EncryptedEnvelope = {
    ciphertext: fromBase64(wire.encrypted_content, "encrypted_content"),
    nonce: fromBase64(wire.iv, "iv"),
    tag: fromBase64(wire.tag, "tag"),
  };
  if (wire.encrypted_key !== undefined) {
    envelope.encryptedKey = fromBase64(wire.encrypted_key, "encrypted_key");
  }
  return envelope;
}

/**
 * Encrypt under `key` and wrap `key` for `recipient`. Pass a fresh or
 * conversation-scoped key; the nonce is always fresh.
 */
export async function sealHybridEnvelope(
  plaintext: string,
  key: Uint8Array,
  recipient: RsaPublicKey,
): Promise<EncryptedEnvelope> {
  const box = await encryptSymmetric(plaintext, key);
  return { ...box, encryptedKey: rsaOaepEncrypt(recipient, key) };
}

/**
 * Unwrap the content key with an RSA private key and decrypt.
 * @throws AuthenticationFailedError on a wrong key or tampered envelope.
 */
export async function openHybridEnvelope(
  envelope: EncryptedEnvelope,
  privateKey: RsaPrivateKey,
): Promise<string> {
  if (!envelope.encryptedKey) {
    throw new KeyFormatError("Envelope carries no wrapped key", "encrypted_key");
  }
  const key = rsaOaepDecrypt(privateKey, envelope.encryptedKey);
  return decryptSymmetric(envelope, key);
}
