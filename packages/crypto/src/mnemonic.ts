/**
 * BIP-39 recovery phrases for identity seeds (English word list).
 * A 32-byte seed maps to exactly 24 words; the last word carries an
 * 8-bit SHA-256 checksum.
 * @module mnemonic
 */
import { entropyToMnemonic, mnemonicToEntropy } from "@scure/bip39";
import { wordlist } from "@scure/bip39/wordlists/english";
import { InvalidMnemonicError } from "./errors.js";
import { assertSeed, IDENTITY_SEED_BYTES } from "./identity.js";

export const MNEMONIC_WORD_COUNT = 24;

/** Trim, lower-case and collapse whitespace between words. */
export function normalizeMnemonic(phrase: string): string {
  return phrase.trim().toLowerCase().split(/\s+/).join(" ");
}

export function mnemonicFromSeed(seed: Uint8Array): string {
  assertSeed(seed);
  return entropyToMnemonic(seed, wordlist);
}

/**
 * @throws InvalidMnemonicError on a wrong word count, an unknown word or a
 *   checksum mismatch.
 */
export function seedFromMnemonic(phrase: string): Uint8Array {
  const normalized = normalizeMnemonic(phrase);
  const words = normalized.length === 0 ? [] : normalized.split(" ");
  if (words.length !== MNEMONIC_WORD_COUNT) {
    throw new InvalidMnemonicError(
      `Recovery phrase must have ${MNEMONIC_WORD_COUNT} words, got ${words.length}`,
    );
  }
  const unknown = words.findIndex((w) => !wordlist.includes(w));
  if (unknown !== -1) {
    throw new InvalidMnemonicError(`Unknown word at position ${unknown + 1}`);
  }

  let entropy: Uint8Array;
  try {
    entropy = mnemonicToEntropy(normalized, wordlist);
  } catch (err) {
    throw new InvalidMnemonicError("Recovery phrase checksum does not match", {
      cause: err,
    });
  }
  if (entropy.length !== IDENTITY_SEED_BYTES) {
    throw new InvalidMnemonicError("Recovery phrase does not encode a 32-byte seed");
  }
  return entropy;
}

export function isValidMnemonic(phrase: string): boolean {
  try {
    seedFromMnemonic(phrase);
    return true;
  } catch (err) {
    if (err instanceof InvalidMnemonicError) return false;
    throw err;
  }
}
