/**
 * Perceptual Hasher: average hash.
 *
 * The image is reduced to `hashSize × hashSize` grayscale cells by area
 * averaging; each bit is set when its cell is brighter than the mean of
 * all cells. Visually similar screenshots produce hashes a small Hamming
 * distance apart.
 */

import { HashSizeMismatchError, ValidationError } from "@droidprobe/errors";
import { DEFAULT_HASH_SIZE } from "./constants.js";
import { type Image, loadImage } from "./image.js";
import { areaAverage } from "./transform.js";

export class PerceptualHash {
  readonly bits: readonly boolean[];

  constructor(bits: readonly boolean[]) {
    if (bits.length === 0 || bits.length % 4 !== 0) {
      throw new ValidationError(`Hash bit length must be a positive multiple of 4, got ${bits.length}`);
    }
    this.bits = Object.freeze([...bits]);
  }

  get size(): number {
    return this.bits.length;
  }

  /** Hex string, most significant bit first. */
  toHex(): string {
    let hex = "";
    for (let i = 0; i < this.bits.length; i += 4) {
      let nibble = 0;
      for (let j = 0; j < 4; j++) {
        nibble = (nibble << 1) | (this.bits[i + j] ? 1 : 0);
      }
      hex += nibble.toString(16);
    }
    return hex;
  }

  toString(): string {
    return this.toHex();
  }

  static fromHex(hex: string): PerceptualHash {
    if (hex.length === 0 || !/^[0-9a-fA-F]+$/.test(hex)) {
      throw new ValidationError(`Invalid perceptual hash "${hex}"`);
    }
    const bits: boolean[] = [];
    for (const char of hex) {
      const nibble = Number.parseInt(char, 16);
      for (let j = 3; j >= 0; j--) {
        bits.push(((nibble >> j) & 1) === 1);
      }
    }
    return new PerceptualHash(bits);
  }
}

export function fingerprint(image: Image, hashSize: number = DEFAULT_HASH_SIZE): PerceptualHash {
  if (!Number.isInteger(hashSize) || hashSize < 2) {
    throw new ValidationError(`hashSize must be an integer >= 2, got ${hashSize}`);
  }

  const cells = areaAverage(image, hashSize, hashSize).data;
  let total = 0;
  for (const value of cells) total += value;
  const mean = total / cells.length;

  return new PerceptualHash(Array.from(cells, (value) => value > mean));
}

/**
 * Read a PNG from disk and fingerprint it.
 */
export async function fingerprintFile(
  path: string,
  hashSize: number = DEFAULT_HASH_SIZE,
): Promise<PerceptualHash> {
  return fingerprint(await loadImage(path), hashSize);
}

/**
 * Hamming distance between two hashes of the same size.
 *
 * @throws {HashSizeMismatchError} when the sizes differ
 */
export function hashDistance(a: PerceptualHash, b: PerceptualHash): number {
  if (a.size !== b.size) {
    throw new HashSizeMismatchError(a.size, b.size);
  }
  let distance = 0;
  for (let i = 0; i < a.size; i++) {
    if (a.bits[i] !== b.bits[i]) distance++;
  }
  return distance;
}
