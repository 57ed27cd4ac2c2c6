/**
 * Minimal DER encoder/decoder for the handful of ASN.1 types RSA key
 * containers use: INTEGER, BIT STRING, OCTET STRING, NULL, OBJECT
 * IDENTIFIER and SEQUENCE.
 *
 * @module asn1
 */
import { KeyFormatError } from "./errors.js";

export enum Tag {
  Integer = 0x02,
  BitString = 0x03,
  OctetString = 0x04,
  Null = 0x05,
  ObjectIdentifier = 0x06,
  Sequence = 0x30,
}

/** A decoded TLV node. Constructed nodes carry children, primitives content. */
export interface Asn1Node {
  tag: number;
  content: Uint8Array;
  children: Asn1Node[];
}

// --- Big integers ---

/**
 * Minimal two's-complement big-endian bytes for an integer. Positive
 * values whose top byte has the high bit set get a 0x00 prefix so DER
 * keeps reading them as positive.
 */
export function bigIntToBytes(value: bigint): Uint8Array {
  if (value === 0n) return new Uint8Array([0]);

  const negative = value < 0n;
  // For negatives, encode (2^(8n) + value) for the smallest n that fits.
  let magnitude = negative ? -value - 1n : value;
  const bytes: number[] = [];
  while (magnitude > 0n) {
    bytes.unshift(Number(magnitude & 0xffn));
    magnitude >>= 8n;
  }
  if (bytes.length === 0) bytes.push(0);

  if (negative) {
    for (let i = 0; i < bytes.length; i++) bytes[i] = ~(bytes[i] ?? 0) & 0xff;
    if (((bytes[0] ?? 0) & 0x80) === 0) bytes.unshift(0xff);
  } else if (((bytes[0] ?? 0) & 0x80) !== 0) {
    bytes.unshift(0x00);
  }
  return Uint8Array.from(bytes);
}

/** Inverse of {@link bigIntToBytes}: signed two's-complement big-endian. */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;
  let value = 0n;
  for (const b of bytes) value = (value << 8n) | BigInt(b);
  if (((bytes[0] ?? 0) & 0x80) !== 0) {
    value -= 1n << BigInt(bytes.length * 8);
  }
  return value;
}

/** Unsigned big-endian bytes without sign padding. */
export function bigIntToUnsignedBytes(value: bigint): Uint8Array {
  if (value < 0n) throw new RangeError("Expected a non-negative integer");
  const signed = bigIntToBytes(value);
  return signed.length > 1 && signed[0] === 0 ? signed.slice(1) : signed;
}

export function unsignedBytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const b of bytes) value = (value << 8n) | BigInt(b);
  return value;
}

// --- Encoding ---

function encodeLength(length: number): Uint8Array {
  if (length < 0x80) return Uint8Array.of(length);
  const out: number[] = [];
  let rest = length;
  while (rest > 0) {
    out.unshift(rest & 0xff);
    rest = Math.floor(rest / 256);
  }
  return Uint8Array.from([0x80 | out.length, ...out]);
}

function concat(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

export function encodeTlv(tag: number, content: Uint8Array): Uint8Array {
  return concat([Uint8Array.of(tag), encodeLength(content.length), content]);
}

export function encodeInteger(value: bigint): Uint8Array {
  return encodeTlv(Tag.Integer, bigIntToBytes(value));
}

export function encodeNull(): Uint8Array {
  return encodeTlv(Tag.Null, new Uint8Array(0));
}

export function encodeOctetString(content: Uint8Array): Uint8Array {
  return encodeTlv(Tag.OctetString, content);
}

/** BIT STRING with zero unused bits. */
export function encodeBitString(content: Uint8Array): Uint8Array {
  return encodeTlv(Tag.BitString, concat([Uint8Array.of(0), content]));
}

export function encodeSequence(items: readonly Uint8Array[]): Uint8Array {
  return encodeTlv(Tag.Sequence, concat(items));
}

/** Dotted OID string to DER (base-128 arcs, first two arcs folded). */
export function encodeObjectIdentifier(oid: string): Uint8Array {
  const arcs = oid.split(".").map((a) => {
    if (!/^\d+$/.test(a)) throw new KeyFormatError(`Invalid OID ${oid}`, "algorithm");
    return BigInt(a);
  });
  const [first, second, ...rest] = arcs;
  if (first === undefined || second === undefined) {
    throw new KeyFormatError(`Invalid OID ${oid}`, "algorithm");
  }
  const out: number[] = [];
  for (const arc of [first * 40n + second, ...rest]) {
    const chunk: number[] = [Number(arc & 0x7fn)];
    let v = arc >> 7n;
    while (v > 0n) {
      chunk.unshift(Number(v & 0x7fn) | 0x80);
      v >>= 7n;
    }
    out.push(...chunk);
  }
  return encodeTlv(Tag.ObjectIdentifier, Uint8Array.from(out));
}

// --- Decoding ---

function isConstructed(tag: number): boolean {
  return (tag & 0x20) !== 0;
}

function readNode(data: Uint8Array, offset: number, field: string): { node: Asn1Node; next: number } {
  const tag = data[offset];
  const first = data[offset + 1];
  if (tag === undefined || first === undefined) {
    throw new KeyFormatError(`Truncated DER in ${field}`, field);
  }
  if ((tag & 0x1f) === 0x1f) {
    throw new KeyFormatError(`Unsupported multi-byte tag in ${field}`, field);
  }

  let length: number;
  let cursor = offset + 2;
  if (first < 0x80) {
    length = first;
  } else {
    const count = first & 0x7f;
    if (count === 0 || count > 4) {
      throw new KeyFormatError(`Unsupported DER length in ${field}`, field);
    }
    length = 0;
    for (let i = 0; i < count; i++) {
      const b = data[cursor + i];
      if (b === undefined) throw new KeyFormatError(`Truncated DER length in ${field}`, field);
      length = length * 256 + b;
    }
    cursor += count;
  }
  const end = cursor + length;
  if (end > data.length) {
    throw new KeyFormatError(`DER element overruns its container in ${field}`, field);
  }

  const content = data.subarray(cursor, end);
  const children = isConstructed(tag) ? decodeAll(content, field) : [];
  return { node: { tag, content, children }, next: end };
}

function decodeAll(data: Uint8Array, field: string): Asn1Node[] {
  const nodes: Asn1Node[] = [];
  let offset = 0;
  while (offset < data.length) {
    const { node, next } = readNode(data, offset, field);
    nodes.push(node);
    offset = next;
  }
  return nodes;
}

/** Decode exactly one DER element spanning the whole input. */
export function decodeDer(data: Uint8Array, field = "der"): Asn1Node {
  const { node, next } = readNode(data, 0, field);
  if (next !== data.length) {
    throw new KeyFormatError(`Trailing bytes after DER element in ${field}`, field);
  }
  return node;
}

export function expectTag(node: Asn1Node | undefined, tag: Tag, field: string): Asn1Node {
  if (!node) throw new KeyFormatError(`Missing ${field}`, field);
  if (node.tag !== tag) {
    throw new KeyFormatError(
      `Expected tag 0x${tag.toString(16)} for ${field}, got 0x${node.tag.toString(16)}`,
      field,
    );
  }
  return node;
}

export function readInteger(node: Asn1Node | undefined, field: string): bigint {
  const n = expectTag(node, Tag.Integer, field);
  if (n.content.length === 0) throw new KeyFormatError(`Empty INTEGER for ${field}`, field);
  return bytesToBigInt(n.content);
}

export function readObjectIdentifier(node: Asn1Node | undefined, field: string): string {
  const n = expectTag(node, Tag.ObjectIdentifier, field);
  const arcs: bigint[] = [];
  let value = 0n;
  for (const b of n.content) {
    value = (value << 7n) | BigInt(b & 0x7f);
    if ((b & 0x80) === 0) {
      arcs.push(value);
      value = 0n;
    }
  }
  const [head, ...rest] = arcs;
  if (head === undefined) throw new KeyFormatError(`Empty OID for ${field}`, field);
  const first = head < 80n ? head / 40n : 2n;
  return [first, head - first * 40n, ...rest].join(".");
}

/** Content of a BIT STRING, which must have zero unused bits. */
export function readBitString(node: Asn1Node | undefined, field: string): Uint8Array {
  const n = expectTag(node, Tag.BitString, field);
  if (n.content[0] !== 0) {
    throw new KeyFormatError(`BIT STRING for ${field} has unused bits`, field);
  }
  return n.content.subarray(1);
}
