/**
 * RSA key containers in the formats the backend and the legacy export
 * screens exchange:
 *
 *   PUBLIC KEY       SubjectPublicKeyInfo { rsaEncryption, BIT STRING(RSAPublicKey) }
 *   RSA PUBLIC KEY   PKCS#1 RSAPublicKey (decode only)
 *   PRIVATE KEY      PKCS#8 { 0, rsaEncryption, OCTET STRING(RSAPrivateKey) }
 *   RSA PRIVATE KEY  PKCS#1 RSAPrivateKey (decode only)
 *
 * Bodies are base64 wrapped at 64 columns.
 *
 * @module key-codec
 */
import {
  decodeDer,
  encodeBitString,
  encodeInteger,
  encodeNull,
  encodeObjectIdentifier,
  encodeOctetString,
  encodeSequence,
  expectTag,
  readBitString,
  readInteger,
  readObjectIdentifier,
  Tag,
  type Asn1Node,
} from "./asn1.js";
import { KeyFormatError } from "./errors.js";
import { fromBase64, toBase64 } from "./encoding.js";

export const RSA_ENCRYPTION_OID = "1.2.840.113549.1.1.1";
const PEM_LINE_LENGTH = 64;

export interface RsaPublicKey {
  /** Modulus. */
  n: bigint;
  /** Public exponent. */
  e: bigint;
}

export interface RsaPrivateKey extends RsaPublicKey {
  /** Private exponent. */
  d: bigint;
  p: bigint;
  q: bigint;
  /** d mod (p - 1); computed when absent. */
  dP?: bigint;
  /** d mod (q - 1); computed when absent. */
  dQ?: bigint;
  /** q^-1 mod p; computed when absent. */
  qInv?: bigint;
}

export type CompleteRsaPrivateKey = Required<RsaPrivateKey>;

// --- CRT ---

/** Modular inverse by the extended Euclidean algorithm. */
export function modInverse(a: bigint, m: bigint): bigint {
  let [oldR, r] = [((a % m) + m) % m, m];
  let [oldS, s] = [1n, 0n];
  while (r !== 0n) {
    const q = oldR / r;
    [oldR, r] = [r, oldR - q * r];
    [oldS, s] = [s, oldS - q * s];
  }
  if (oldR !== 1n) throw new RangeError("Value is not invertible modulo m");
  return ((oldS % m) + m) % m;
}

/** Fill in dP, dQ and qInv from d, p and q where missing. */
export function withCrtParams(key: RsaPrivateKey): CompleteRsaPrivateKey {
  return {
    ...key,
    dP: key.dP ?? key.d % (key.p - 1n),
    dQ: key.dQ ?? key.d % (key.q - 1n),
    qInv: key.qInv ?? modInverse(key.q, key.p),
  };
}

export function publicPart(key: RsaPrivateKey): RsaPublicKey {
  return { n: key.n, e: key.e };
}

export function publicKeysEqual(a: RsaPublicKey, b: RsaPublicKey): boolean {
  return a.n === b.n && a.e === b.e;
}

// --- PEM armour ---

function armor(label: string, der: Uint8Array): string {
  const body = toBase64(der);
  const lines: string[] = [];
  for (let i = 0; i < body.length; i += PEM_LINE_LENGTH) {
    lines.push(body.slice(i, i + PEM_LINE_LENGTH));
  }
  return `-----BEGIN ${label}-----\n${lines.join("\n")}\n-----END ${label}-----`;
}

const PEM_PATTERN =
  /^-----BEGIN ([A-Z0-9 ]+)-----\r?\n([A-Za-z0-9+/=\r\n]+?)\r?\n?-----END \1-----$/;

function dearmor(pem: string, accepted: readonly string[]): { label: string; der: Uint8Array } {
  const match = PEM_PATTERN.exec(pem.trim());
  const label = match?.[1];
  const body = match?.[2];
  if (!label || !body) {
    throw new KeyFormatError("Missing or malformed PEM header", "header");
  }
  if (!accepted.includes(label)) {
    throw new KeyFormatError(
      `Unexpected PEM label "${label}", expected ${accepted.join(" or ")}`,
      "header",
    );
  }
  const der = fromBase64(body.replace(/\s+/g, ""), "body");
  if (der.length === 0) throw new KeyFormatError("Empty PEM body", "body");
  return { label, der };
}

// --- Structures ---

function rsaAlgorithmIdentifier(): Uint8Array {
  return encodeSequence([encodeObjectIdentifier(RSA_ENCRYPTION_OID), encodeNull()]);
}

function expectRsaAlgorithm(node: Asn1Node | undefined): void {
  const seq = expectTag(node, Tag.Sequence, "algorithm");
  const oid = readObjectIdentifier(seq.children[0], "algorithm");
  if (oid !== RSA_ENCRYPTION_OID) {
    throw new KeyFormatError(`Unsupported key algorithm ${oid}`, "algorithm");
  }
}

function positive(value: bigint, field: string): bigint {
  if (value <= 0n) throw new KeyFormatError(`${field} must be positive`, field);
  return value;
}

export function encodeRsaPublicKeyDer(key: RsaPublicKey): Uint8Array {
  return encodeSequence([encodeInteger(key.n), encodeInteger(key.e)]);
}

function decodeRsaPublicKeyDer(der: Uint8Array): RsaPublicKey {
  const seq = expectTag(decodeDer(der, "publicKey"), Tag.Sequence, "publicKey");
  return {
    n: positive(readInteger(seq.children[0], "modulus"), "modulus"),
    e: positive(readInteger(seq.children[1], "publicExponent"), "publicExponent"),
  };
}

export function encodeRsaPrivateKeyDer(key: RsaPrivateKey): Uint8Array {
  const full = withCrtParams(key);
  return encodeSequence([
    encodeInteger(0n),
    encodeInteger(full.n),
    encodeInteger(full.e),
    encodeInteger(full.d),
    encodeInteger(full.p),
    encodeInteger(full.q),
    encodeInteger(full.dP),
    encodeInteger(full.dQ),
    encodeInteger(full.qInv),
  ]);
}

const PRIVATE_FIELDS = [
  "version",
  "modulus",
  "publicExponent",
  "privateExponent",
  "prime1",
  "prime2",
  "exponent1",
  "exponent2",
  "coefficient",
] as const;

function decodeRsaPrivateKeyDer(der: Uint8Array): CompleteRsaPrivateKey {
  const seq = expectTag(decodeDer(der, "privateKey"), Tag.Sequence, "privateKey");
  const values = PRIVATE_FIELDS.map((field, i) => readInteger(seq.children[i], field));
  const [version, n, e, d, p, q, dP, dQ, qInv] = values;
  if (version !== 0n) {
    throw new KeyFormatError("Only two-prime RSAPrivateKey (version 0) is supported", "version");
  }
  if (
    n === undefined || e === undefined || d === undefined || p === undefined ||
    q === undefined || dP === undefined || dQ === undefined || qInv === undefined
  ) {
    throw new KeyFormatError("Incomplete RSAPrivateKey", "privateKey");
  }
  const key: CompleteRsaPrivateKey = {
    n: positive(n, "modulus"),
    e: positive(e, "publicExponent"),
    d: positive(d, "privateExponent"),
    p: positive(p, "prime1"),
    q: positive(q, "prime2"),
    dP,
    dQ,
    qInv,
  };
  if (key.p * key.q !== key.n) {
    throw new KeyFormatError("Primes do not multiply to the modulus", "modulus");
  }
  return key;
}

// --- PEM API ---

/** SubjectPublicKeyInfo PEM ("PUBLIC KEY"). */
export function encodePublicKeyPEM(key: RsaPublicKey): string {
  const spki = encodeSequence([
    rsaAlgorithmIdentifier(),
    encodeBitString(encodeRsaPublicKeyDer(key)),
  ]);
  return armor("PUBLIC KEY", spki);
}

/**
 * Accepts SubjectPublicKeyInfo ("PUBLIC KEY") or PKCS#1 ("RSA PUBLIC KEY").
 * @throws KeyFormatError naming the offending field.
 */
export function decodePublicKeyPEM(pem: string): RsaPublicKey {
  const { label, der } = dearmor(pem, ["PUBLIC KEY", "RSA PUBLIC KEY"]);
  if (label === "RSA PUBLIC KEY") return decodeRsaPublicKeyDer(der);

  const spki = expectTag(decodeDer(der, "publicKey"), Tag.Sequence, "publicKey");
  expectRsaAlgorithm(spki.children[0]);
  return decodeRsaPublicKeyDer(readBitString(spki.children[1], "publicKey"));
}

/** PKCS#8 PEM ("PRIVATE KEY") wrapping a PKCS#1 RSAPrivateKey. */
export function encodePrivateKeyPEM(key: RsaPrivateKey): string {
  const pkcs8 = encodeSequence([
    encodeInteger(0n),
    rsaAlgorithmIdentifier(),
    encodeOctetString(encodeRsaPrivateKeyDer(key)),
  ]);
  return armor("PRIVATE KEY", pkcs8);
}

/**
 * Accepts PKCS#8 ("PRIVATE KEY") or PKCS#1 ("RSA PRIVATE KEY").
 * @throws KeyFormatError naming the offending field.
 */
export function decodePrivateKeyPEM(pem: string): CompleteRsaPrivateKey {
  const { label, der } = dearmor(pem, ["PRIVATE KEY", "RSA PRIVATE KEY"]);
  if (label === "RSA PRIVATE KEY") return decodeRsaPrivateKeyDer(der);

  const info = expectTag(decodeDer(der, "privateKey"), Tag.Sequence, "privateKey");
  if (readInteger(info.children[0], "version") !== 0n) {
    throw new KeyFormatError("Unsupported PKCS#8 version", "version");
  }
  expectRsaAlgorithm(info.children[1]);
  const inner = expectTag(info.children[2], Tag.OctetString, "privateKey");
  return decodeRsaPrivateKeyDer(inner.content);
}
