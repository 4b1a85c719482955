import type { RgbaImage } from "../../image.js";

export function makeImage(
  width: number,
  height: number,
  pixel: (x: number, y: number) => number,
): RgbaImage {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const v = pixel(x, y);
      const p = (y * width + x) * 4;
      data[p] = v;
      data[p + 1] = v;
      data[p + 2] = v;
      data[p + 3] = 255;
    }
  }
  return { kind: "rgba", width, height, data };
}

/** Dark frame with one bright block in the top-left corner; no rotational symmetry. */
export function cornerBlock(width: number, height: number): RgbaImage {
  return makeImage(width, height, (x, y) => (x < width / 2 && y < height / 3 ? 255 : 0));
}
