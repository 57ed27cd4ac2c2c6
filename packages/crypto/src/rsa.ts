/**
 * Legacy RSA-2048 keys and RSA-OAEP(SHA-256) key wrapping.
 *
 * Kept for the hybrid channel to the backend, which still publishes an
 * RSA public key, and for identities created before the seed scheme.
 * Keys travel through our own PEM codec into node:crypto, so anything the
 * codec emits is also checked by OpenSSL's parser.
 *
 * @module rsa
 */
import {
  constants,
  createPrivateKey,
  createPublicKey,
  generateKeyPair,
  privateDecrypt,
  publicEncrypt,
  type JsonWebKey,
  type KeyObject,
} from "node:crypto";
import {
  decodePrivateKeyPEM,
  encodePrivateKeyPEM,
  encodePublicKeyPEM,
  type CompleteRsaPrivateKey,
  type RsaPrivateKey,
  type RsaPublicKey,
} from "./key-codec.js";
import { unsignedBytesToBigInt } from "./asn1.js";
import { AuthenticationFailedError, KeyFormatError } from "./errors.js";

export const LEGACY_RSA_BITS = 2048;
const PUBLIC_EXPONENT = 0x10001;

function jwkInteger(jwk: JsonWebKey, field: string): bigint {
  const value = jwk[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new KeyFormatError(`JWK is missing ${field}`, field);
  }
  return unsignedBytesToBigInt(new Uint8Array(Buffer.from(value, "base64url")));
}

/** Read an RSA KeyObject back into codec form. */
export function fromPrivateKeyObject(key: KeyObject): CompleteRsaPrivateKey {
  const jwk = key.export({ format: "jwk" });
  return {
    n: jwkInteger(jwk, "n"),
    e: jwkInteger(jwk, "e"),
    d: jwkInteger(jwk, "d"),
    p: jwkInteger(jwk, "p"),
    q: jwkInteger(jwk, "q"),
    dP: jwkInteger(jwk, "dp"),
    dQ: jwkInteger(jwk, "dq"),
    qInv: jwkInteger(jwk, "qi"),
  };
}

/** Generate an independent (not seed-derived) legacy keypair. */
export async function generateLegacyRsaKeypair(
  bits: number = LEGACY_RSA_BITS,
): Promise<CompleteRsaPrivateKey> {
  const privateKey = await new Promise<KeyObject>((resolve, reject) => {
    generateKeyPair(
      "rsa",
      { modulusLength: bits, publicExponent: PUBLIC_EXPONENT },
      (err, _publicKey, priv) => (err ? reject(err) : resolve(priv)),
    );
  });
  return fromPrivateKeyObject(privateKey);
}

function toPublicKeyObject(key: RsaPublicKey): KeyObject {
  try {
    return createPublicKey({ key: encodePublicKeyPEM(key), format: "pem" });
  } catch (err) {
    throw new KeyFormatError("RSA public key rejected by the platform", "publicKey", { cause: err });
  }
}

function toPrivateKeyObject(key: RsaPrivateKey): KeyObject {
  try {
    return createPrivateKey({ key: encodePrivateKeyPEM(key), format: "pem" });
  } catch (err) {
    throw new KeyFormatError("RSA private key rejected by the platform", "privateKey", { cause: err });
  }
}

/** RSA-OAEP with SHA-256 for both the digest and MGF1. */
export function rsaOaepEncrypt(key: RsaPublicKey, data: Uint8Array): Uint8Array {
  const out = publicEncrypt(
    {
      key: toPublicKeyObject(key),
      padding: constants.RSA_PKCS1_OAEP_PADDING,
      oaepHash: "sha256",
    },
    data,
  );
  return new Uint8Array(out);
}

/** @throws AuthenticationFailedError when the wrapped data does not open. */
export function rsaOaepDecrypt(key: RsaPrivateKey, data: Uint8Array): Uint8Array {
  const keyObject = toPrivateKeyObject(key);
  try {
    const out = privateDecrypt(
      {
        key: keyObject,
        padding: constants.RSA_PKCS1_OAEP_PADDING,
        oaepHash: "sha256",
      },
      data,
    );
    return new Uint8Array(out);
  } catch (err) {
    throw new AuthenticationFailedError("RSA-OAEP unwrap failed", { cause: err });
  }
}

/** Decode a private PEM and confirm the platform accepts it. */
export function loadPrivateKeyPEM(pem: string): CompleteRsaPrivateKey {
  const key = decodePrivateKeyPEM(pem);
  toPrivateKeyObject(key);
  return key;
}
