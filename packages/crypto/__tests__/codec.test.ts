/**
 * RSA key codec (ASN.1 DER, PEM), RSA-OAEP and hybrid envelopes.
 */
import { describe, it, expect, beforeAll } from "vitest";
import { createPrivateKey, createPublicKey } from "node:crypto";
import {
  decodeDer,
  encodeInteger,
  encodeObjectIdentifier,
  encodeSequence,
  Tag,
} from "../src/asn1.js";
import {
  initSodium,
  toBase64,
  toHex,
  bigIntToBytes,
  bytesToBigInt,
  modInverse,
  withCrtParams,
  publicPart,
  encodePublicKeyPEM,
  decodePublicKeyPEM,
  encodePrivateKeyPEM,
  decodePrivateKeyPEM,
  generateLegacyRsaKeypair,
  loadPrivateKeyPEM,
  rsaOaepEncrypt,
  rsaOaepDecrypt,
  generateSymmetricKey,
  sealHybridEnvelope,
  openHybridEnvelope,
  envelopeToWire,
  envelopeFromWire,
  encryptSymmetric,
  AuthenticationFailedError,
  KeyFormatError,
  RSA_ENCRYPTION_OID,
  type CompleteRsaPrivateKey,
} from "../src/index.js";

// Textbook RSA: p = 61, q = 53, e = 17, d = 2753
const TINY_KEY = { n: 3233n, e: 17n, d: 2753n, p: 61n, q: 53n };

let legacy: CompleteRsaPrivateKey;

beforeAll(async () => {
  await initSodium();
  legacy = await generateLegacyRsaKeypair();
});

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function pem(label: string, der: Uint8Array): string {
  return `-----BEGIN ${label}-----\n${toBase64(der)}\n-----END ${label}-----`;
}

describe("ASN.1 integers", () => {
  it("should prefix a zero byte when the high bit is set", () => {
    expect(encodeInteger(0x80n)).toEqual(Uint8Array.of(0x02, 0x02, 0x00, 0x80));
    expect(encodeInteger(0x7fn)).toEqual(Uint8Array.of(0x02, 0x01, 0x7f));
    expect(encodeInteger(0n)).toEqual(Uint8Array.of(0x02, 0x01, 0x00));
    expect(bigIntToBytes(0xff00n)).toEqual(Uint8Array.of(0x00, 0xff, 0x00));
  });

  it("should encode negatives in minimal two's complement", () => {
    expect(bigIntToBytes(-1n)).toEqual(Uint8Array.of(0xff));
    expect(bigIntToBytes(-128n)).toEqual(Uint8Array.of(0x80));
    expect(bigIntToBytes(-129n)).toEqual(Uint8Array.of(0xff, 0x7f));
    expect(bytesToBigInt(Uint8Array.of(0xff, 0x7f))).toBe(-129n);
    expect(bytesToBigInt(Uint8Array.of(0x00, 0x80))).toBe(128n);
  });

  it("should use long-form lengths past 127 bytes", () => {
    const value = 1n << 1023n;
    const der = encodeInteger(value);
    // 128 value bytes plus the sign byte
    expect(Array.from(der.subarray(0, 4))).toEqual([0x02, 0x81, 0x81, 0x00]);
    expect(bytesToBigInt(decodeDer(der).content)).toBe(value);
  });
});

describe("ASN.1 structure", () => {
  it("should encode the rsaEncryption OID", () => {
    expect(toHex(encodeObjectIdentifier(RSA_ENCRYPTION_OID))).toBe("06092a864886f70d010101");
  });

  it("should decode nested sequences", () => {
    const node = decodeDer(encodeSequence([encodeInteger(1n), encodeInteger(2n)]));
    expect(node.tag).toBe(Tag.Sequence);
    expect(node.children.map((c) => bytesToBigInt(c.content))).toEqual([1n, 2n]);
  });

  it("should reject trailing and truncated data", () => {
    expect(() => decodeDer(Uint8Array.of(0x05, 0x00, 0x00))).toThrow(KeyFormatError);
    expect(() => decodeDer(Uint8Array.of(0x02, 0x05, 0x01))).toThrow(KeyFormatError);
    expect(() => decodeDer(Uint8Array.of(0x02))).toThrow(KeyFormatError);
  });
});

describe("CRT parameters", () => {
  it("should compute dP, dQ and qInv", () => {
    expect(modInverse(53n, 61n)).toBe(38n);
    const full = withCrtParams(TINY_KEY);
    expect(full.dP).toBe(53n);
    expect(full.dQ).toBe(49n);
    expect(full.qInv).toBe(38n);
  });

  it("should refuse a non-invertible value", () => {
    expect(() => modInverse(6n, 9n)).toThrow(RangeError);
  });
});

describe("PEM codec", () => {
  it("should round-trip a generated public key", () => {
    const pub = publicPart(legacy);
    expect(decodePublicKeyPEM(encodePublicKeyPEM(pub))).toEqual(pub);
  });

  it("should round-trip a generated private key", () => {
    expect(decodePrivateKeyPEM(encodePrivateKeyPEM(legacy))).toEqual(legacy);
  });

  it("should keep a modulus with its top bit set positive", () => {
    // A 2048-bit modulus always has the top bit of its leading byte set.
    expect(legacy.n >> 2047n).toBe(1n);
    const decoded = decodePublicKeyPEM(encodePublicKeyPEM(publicPart(legacy)));
    expect(decoded.n > 0n).toBe(true);
    expect(decoded.n).toBe(legacy.n);
  });

  it("should emit the same PEM as the platform", () => {
    const ours = encodePublicKeyPEM(publicPart(legacy));
    const platform = createPublicKey(ours).export({ type: "spki", format: "pem" });
    expect(ours).toBe(platform.toString().trim());

    const ourPrivate = encodePrivateKeyPEM(legacy);
    const platformPrivate = createPrivateKey(ourPrivate).export({ type: "pkcs8", format: "pem" });
    expect(ourPrivate).toBe(platformPrivate.toString().trim());
  });

  it("should accept PKCS#1 PEMs produced by the platform", () => {
    const key = createPrivateKey(encodePrivateKeyPEM(legacy));
    const pkcs1Private = key.export({ type: "pkcs1", format: "pem" }).toString();
    const pkcs1Public = createPublicKey(key).export({ type: "pkcs1", format: "pem" }).toString();
    expect(decodePrivateKeyPEM(pkcs1Private)).toEqual(legacy);
    expect(decodePublicKeyPEM(pkcs1Public)).toEqual(publicPart(legacy));
  });

  it("should fill in CRT parameters for keys that lack them", () => {
    const decoded = decodePrivateKeyPEM(encodePrivateKeyPEM(TINY_KEY));
    expect(decoded).toEqual({ ...TINY_KEY, dP: 53n, dQ: 49n, qInv: 38n });
  });

  it("should name the header when markers are missing or wrong", () => {
    expect(thrown(() => decodePublicKeyPEM("not a key"))).toMatchObject({
      name: "KeyFormatError",
      field: "header",
    });
    const privatePem = encodePrivateKeyPEM(TINY_KEY);
    expect(thrown(() => decodePublicKeyPEM(privatePem))).toMatchObject({ field: "header" });
  });

  it("should name the body when base64 is invalid", () => {
    const bad = "-----BEGIN PUBLIC KEY-----\nAAA\n-----END PUBLIC KEY-----";
    expect(thrown(() => decodePublicKeyPEM(bad))).toMatchObject({ field: "body" });
  });

  it("should reject a non-positive modulus", () => {
    const der = encodeSequence([encodeInteger(0n), encodeInteger(65537n)]);
    expect(thrown(() => decodePublicKeyPEM(pem("RSA PUBLIC KEY", der)))).toMatchObject({
      name: "KeyFormatError",
      field: "modulus",
    });
  });

  it("should reject primes that do not match the modulus", () => {
    const mismatched = encodePrivateKeyPEM({ ...TINY_KEY, q: 59n });
    expect(thrown(() => decodePrivateKeyPEM(mismatched))).toMatchObject({ field: "modulus" });
  });

  it("should reject an unsupported algorithm", () => {
    const spki = encodeSequence([
      encodeSequence([encodeObjectIdentifier("1.2.840.10045.2.1")]),
      Uint8Array.of(0x03, 0x01, 0x00),
    ]);
    expect(thrown(() => decodePublicKeyPEM(pem("PUBLIC KEY", spki)))).toMatchObject({
      field: "algorithm",
    });
  });

  it("should validate private keys with the platform on load", () => {
    expect(loadPrivateKeyPEM(encodePrivateKeyPEM(legacy))).toEqual(legacy);
  });
});

describe("RSA-OAEP", () => {
  it("should wrap and unwrap a symmetric key", () => {
    const key = generateSymmetricKey();
    const wrapped = rsaOaepEncrypt(publicPart(legacy), key);
    expect(wrapped.length).toBe(256);
    expect(rsaOaepDecrypt(legacy, wrapped)).toEqual(key);
  });

  it("should fail closed with the wrong private key", async () => {
    const other = await generateLegacyRsaKeypair(1024);
    const wrapped = rsaOaepEncrypt(publicPart(legacy), generateSymmetricKey());
    expect(() => rsaOaepDecrypt(other, wrapped)).toThrow(AuthenticationFailedError);
  });
});

describe("hybrid envelope", () => {
  it("should open with the recipient's private key", async () => {
    const key = generateSymmetricKey();
    const envelope = await sealHybridEnvelope("hello server", key, publicPart(legacy));
    expect(await openHybridEnvelope(envelope, legacy)).toBe("hello server");
  });

  it("should survive the wire format", async () => {
    const envelope = await sealHybridEnvelope("over the wire", generateSymmetricKey(), publicPart(legacy));
    const wire = envelopeToWire(envelope);
    expect(Object.keys(wire).sort()).toEqual(["encrypted_content", "encrypted_key", "iv", "tag"]);
    expect(await openHybridEnvelope(envelopeFromWire(wire), legacy)).toBe("over the wire");
  });

  it("should omit encrypted_key on the symmetric-only path", async () => {
    const wire = envelopeToWire(await encryptSymmetric("local", generateSymmetricKey()));
    expect(wire.encrypted_key).toBeUndefined();
    await expect(openHybridEnvelope(envelopeFromWire(wire), legacy)).rejects.toMatchObject({
      name: "KeyFormatError",
      field: "encrypted_key",
    });
  });

  it("should fail closed on tampered content", async () => {
    const envelope = await sealHybridEnvelope("intact", generateSymmetricKey(), publicPart(legacy));
    const tampered = { ...envelope, ciphertext: Uint8Array.from(envelope.ciphertext).reverse() };
    await expect(openHybridEnvelope(tampered, legacy)).rejects.toThrow(AuthenticationFailedError);
  });

  it("should name the field holding invalid base64", () => {
    const wire = { encrypted_content: "AAAA", iv: "not base64!", tag: "AAAA" };
    expect(thrown(() => envelopeFromWire(wire))).toMatchObject({ field: "iv" });
  });
});
