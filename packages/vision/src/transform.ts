/**
 * Geometric transforms on grayscale images.
 */

import { type GrayImage, type Image, toGrayscale } from "./image.js";

export type Rotation = 90 | 180 | 270;

function sample(image: GrayImage, x: number, y: number): number {
  return image.data[y * image.width + x] ?? 0;
}

/**
 * Bilinear resample to `width × height` (pixel-centre aligned).
 */
export function resample(image: Image, width: number, height: number): GrayImage {
  const src = toGrayscale(image);
  if (src.width === width && src.height === height) return src;

  const out = new Float32Array(width * height);
  if (src.width === 0 || src.height === 0) {
    return { kind: "gray", width, height, data: out };
  }

  const scaleX = src.width / width;
  const scaleY = src.height / height;
  const maxX = src.width - 1;
  const maxY = src.height - 1;

  for (let y = 0; y < height; y++) {
    const sy = Math.min(maxY, Math.max(0, (y + 0.5) * scaleY - 0.5));
    const y0 = Math.floor(sy);
    const y1 = Math.min(maxY, y0 + 1);
    const fy = sy - y0;
    for (let x = 0; x < width; x++) {
      const sx = Math.min(maxX, Math.max(0, (x + 0.5) * scaleX - 0.5));
      const x0 = Math.floor(sx);
      const x1 = Math.min(maxX, x0 + 1);
      const fx = sx - x0;
      const top = sample(src, x0, y0) * (1 - fx) + sample(src, x1, y0) * fx;
      const bottom = sample(src, x0, y1) * (1 - fx) + sample(src, x1, y1) * fx;
      out[y * width + x] = top * (1 - fy) + bottom * fy;
    }
  }
  return { kind: "gray", width, height, data: out };
}

/**
 * Box-filter downscale: each output cell is the coverage-weighted mean of
 * the source pixels it spans.
 */
export function areaAverage(image: Image, width: number, height: number): GrayImage {
  const src = toGrayscale(image);
  const out = new Float32Array(width * height);
  if (src.width === 0 || src.height === 0) {
    return { kind: "gray", width, height, data: out };
  }

  const scaleX = src.width / width;
  const scaleY = src.height / height;

  for (let ty = 0; ty < height; ty++) {
    const y0 = ty * scaleY;
    const y1 = (ty + 1) * scaleY;
    for (let tx = 0; tx < width; tx++) {
      const x0 = tx * scaleX;
      const x1 = (tx + 1) * scaleX;
      let sum = 0;
      let weight = 0;
      for (let sy = Math.floor(y0); sy < Math.ceil(y1); sy++) {
        const wy = Math.min(y1, sy + 1) - Math.max(y0, sy);
        for (let sx = Math.floor(x0); sx < Math.ceil(x1); sx++) {
          const w = (Math.min(x1, sx + 1) - Math.max(x0, sx)) * wy;
          sum += sample(src, sx, sy) * w;
          weight += w;
        }
      }
      out[ty * width + tx] = weight > 0 ? sum / weight : 0;
    }
  }
  return { kind: "gray", width, height, data: out };
}

/**
 * Rotate clockwise by a right angle.
 */
export function rotate(image: Image, degrees: Rotation): GrayImage {
  const src = toGrayscale(image);
  const { width: w, height: h } = src;
  const quarter = degrees !== 180;
  const outWidth = quarter ? h : w;
  const outHeight = quarter ? w : h;
  const out = new Float32Array(w * h);

  for (let y = 0; y < outHeight; y++) {
    for (let x = 0; x < outWidth; x++) {
      const value =
        degrees === 90
          ? sample(src, y, h - 1 - x)
          : degrees === 180
            ? sample(src, w - 1 - x, h - 1 - y)
            : sample(src, w - 1 - y, x);
      out[y * outWidth + x] = value;
    }
  }
  return { kind: "gray", width: outWidth, height: outHeight, data: out };
}
