/**
 * In-memory image types and PNG decoding.
 */

import { readFile } from "node:fs/promises";
import { ImageDecodeError, toError } from "@droidprobe/errors";
import { PNG } from "pngjs";

/** 8-bit RGBA pixels, row-major. */
export interface RgbaImage {
  readonly kind: "rgba";
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

/** Single-channel intensity (0-255), row-major. */
export interface GrayImage {
  readonly kind: "gray";
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;
}

export type Image = RgbaImage | GrayImage;

const PNG_SIGNATURE = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * True when the buffer starts with the 8-byte PNG signature.
 */
export function hasPngSignature(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((byte, i) => bytes[i] === byte);
}

/**
 * @throws {ImageDecodeError} when the bytes are not a decodable PNG
 */
export function decodePng(buffer: Buffer, source = "<buffer>"): RgbaImage {
  if (!hasPngSignature(buffer)) {
    throw new ImageDecodeError(source, "missing PNG signature");
  }
  try {
    const png = PNG.sync.read(buffer);
    return { kind: "rgba", width: png.width, height: png.height, data: png.data };
  } catch (error) {
    const cause = toError(error);
    throw new ImageDecodeError(source, cause.message, cause);
  }
}

/**
 * Read and decode a PNG file.
 *
 * @throws {ImageDecodeError} when the file cannot be read or decoded
 */
export async function loadImage(path: string): Promise<RgbaImage> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    const cause = toError(error);
    throw new ImageDecodeError(path, cause.message, cause);
  }
  return decodePng(bytes, path);
}

/**
 * ITU-R 601 luma. Gray images are returned unchanged.
 */
export function toGrayscale(image: Image): GrayImage {
  if (image.kind === "gray") return image;

  const { width, height, data } = image;
  const out = new Float32Array(width * height);
  for (let i = 0, p = 0; i < out.length; i++, p += 4) {
    out[i] = 0.299 * (data[p] ?? 0) + 0.587 * (data[p + 1] ?? 0) + 0.114 * (data[p + 2] ?? 0);
  }
  return { kind: "gray", width, height, data: out };
}
