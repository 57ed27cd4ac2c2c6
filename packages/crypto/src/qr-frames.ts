/**
 * Animated-QR transfer of an identity seed between devices.
 *
 * Three frames carry the 24-word phrase in two halves plus a checksum:
 *
 *   otto-seed:1/3:<words 1-12>
 *   otto-seed:2/3:<words 13-24>
 *   otto-seed:3/3:check:<hex of first 8 bytes of HMAC-SHA256(seed, seed)>
 *
 * @module qr-frames
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium } from "./sodium.js";
import { mnemonicFromSeed, seedFromMnemonic } from "./mnemonic.js";
import { assertSeed } from "./identity.js";
import { bytesEqual, fromHex, toHex } from "./encoding.js";
import { InvalidMnemonicError, KeyFormatError } from "./errors.js";

export const QR_FRAME_PREFIX = "otto-seed";
export const QR_FRAME_COUNT = 3;
const CHECKSUM_BYTES = 8;
const CHECK_MARKER = "check:";
const FRAME_PATTERN = /^otto-seed:(\d+)\/(\d+):(.+)$/;

/** Short integrity tag binding the transferred words to the seed. */
export async function seedChecksum(seed: Uint8Array): Promise<string> {
  await initSodium();
  assertSeed(seed);
  const mac = sodium.crypto_auth_hmacsha256(seed, seed);
  return toHex(mac.subarray(0, CHECKSUM_BYTES));
}

export async function seedToQrFrames(seed: Uint8Array): Promise<string[]> {
  const words = mnemonicFromSeed(seed).split(" ");
  const checksum = await seedChecksum(seed);
  return [
    `${QR_FRAME_PREFIX}:1/${QR_FRAME_COUNT}:${words.slice(0, 12).join(" ")}`,
    `${QR_FRAME_PREFIX}:2/${QR_FRAME_COUNT}:${words.slice(12).join(" ")}`,
    `${QR_FRAME_PREFIX}:3/${QR_FRAME_COUNT}:${CHECK_MARKER}${checksum}`,
  ];
}

export interface FrameProgress {
  received: number;
  total: number;
  complete: boolean;
}

/**
 * Collects scanned frames in any order. Duplicates are ignored so a
 * looping animation can be scanned continuously.
 */
export class QrFrameAssembler {
  private readonly frames = new Map<number, string>();

  /** @throws KeyFormatError for anything that is not one of our frames. */
  accept(frame: string): FrameProgress {
    const match = FRAME_PATTERN.exec(frame.trim());
    const index = Number(match?.[1]);
    const total = Number(match?.[2]);
    const data = match?.[3];
    if (!data || total !== QR_FRAME_COUNT || !Number.isInteger(index) || index < 1 || index > total) {
      throw new KeyFormatError("Not a seed transfer frame", "frame");
    }
    if (index === QR_FRAME_COUNT && !data.startsWith(CHECK_MARKER)) {
      throw new KeyFormatError("Checksum frame is missing its marker", "frame");
    }
    if (!this.frames.has(index)) this.frames.set(index, data);
    return this.progress();
  }

  progress(): FrameProgress {
    return {
      received: this.frames.size,
      total: QR_FRAME_COUNT,
      complete: this.frames.size === QR_FRAME_COUNT,
    };
  }

  reset(): void {
    this.frames.clear();
  }

  /**
   * Rebuild and verify the seed. Clears collected frames on a checksum
   * mismatch so scanning can start over.
   * @throws InvalidMnemonicError if the words or the checksum do not verify.
   */
  async finish(): Promise<Uint8Array> {
    const first = this.frames.get(1);
    const second = this.frames.get(2);
    const check = this.frames.get(3);
    if (first === undefined || second === undefined || check === undefined) {
      throw new KeyFormatError(
        `Only ${this.frames.size} of ${QR_FRAME_COUNT} frames received`,
        "frame",
      );
    }

    try {
      const seed = seedFromMnemonic(`${first} ${second}`);
      const expected = fromHex(check.slice(CHECK_MARKER.length), "checksum");
      const actual = fromHex(await seedChecksum(seed));
      if (!bytesEqual(expected, actual)) {
        throw new InvalidMnemonicError("Seed transfer checksum does not match");
      }
      return seed;
    } catch (err) {
      this.reset();
      throw err;
    }
  }
}
