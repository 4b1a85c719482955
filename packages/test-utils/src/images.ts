/**
 * Screenshot fixtures built in memory and encoded with pngjs.
 */

import { writeFile } from "node:fs/promises";
import type { RgbaImage } from "@droidprobe/vision";
import { PNG } from "pngjs";

export type Rgb = readonly [number, number, number];

export function createImage(
  width: number,
  height: number,
  pixel: (x: number, y: number) => Rgb | number,
): RgbaImage {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const value = pixel(x, y);
      const rgb: Rgb = typeof value === "number" ? [value, value, value] : value;
      const [r, g, b] = rgb;
      const p = (y * width + x) * 4;
      data[p] = r;
      data[p + 1] = g;
      data[p + 2] = b;
      data[p + 3] = 255;
    }
  }
  return { kind: "rgba", width, height, data };
}

export function solidImage(width: number, height: number, value: Rgb | number): RgbaImage {
  return createImage(width, height, () => value);
}

/**
 * A dark screen with a bright rectangle, e.g. a dialog or a text field.
 * Coordinates are fractions of the screen size.
 */
export function screenWithBlock(
  width: number,
  height: number,
  block: { readonly left: number; readonly top: number; readonly right: number; readonly bottom: number },
): RgbaImage {
  return createImage(width, height, (x, y) =>
    x >= block.left * width && x < block.right * width && y >= block.top * height && y < block.bottom * height
      ? 255
      : 0,
  );
}

export function encodePng(image: RgbaImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data);
  return PNG.sync.write(png);
}

export async function writePng(path: string, image: RgbaImage): Promise<void> {
  await writeFile(path, encodePng(image));
}
