/**
 * Visual Differencer.
 *
 * All comparisons run on grayscale intensities. When the two images differ
 * in size the second is resampled onto the first's grid.
 */

import {
  DEFAULT_AREA_FRACTION_THRESHOLD,
  DEFAULT_PIXEL_THRESHOLD,
  DEFAULT_ROTATION_THRESHOLD,
  ROTATIONS,
} from "./constants.js";
import { type Image, toGrayscale } from "./image.js";
import { type Rotation, resample, rotate } from "./transform.js";

export interface CompareOptions {
  /** Per-pixel intensity delta above which a pixel counts as changed. */
  readonly pixelThreshold?: number;
  /** Changed-pixel fraction above which the images count as changed. */
  readonly areaFractionThreshold?: number;
  /** Report a size change as a change without comparing pixels. Defaults to true. */
  readonly shortCircuitOnDimensionMismatch?: boolean;
}

export interface CompareResult {
  readonly changed: boolean;
  readonly changeRatio: number;
  readonly dimensionsMatch: boolean;
}

export interface RotationOptions {
  readonly pixelThreshold?: number;
  readonly rotationThreshold?: number;
}

/**
 * Fraction of pixels whose intensity differs by more than `pixelThreshold`.
 */
export function changeRatio(
  a: Image,
  b: Image,
  pixelThreshold: number = DEFAULT_PIXEL_THRESHOLD,
): number {
  const left = toGrayscale(a);
  const right = resample(b, left.width, left.height);
  const total = left.width * left.height;
  if (total === 0) return 0;

  let changed = 0;
  for (let i = 0; i < total; i++) {
    if (Math.abs((left.data[i] ?? 0) - (right.data[i] ?? 0)) > pixelThreshold) {
      changed++;
    }
  }
  return changed / total;
}

export function compareImages(a: Image, b: Image, options: CompareOptions = {}): CompareResult {
  const pixelThreshold = options.pixelThreshold ?? DEFAULT_PIXEL_THRESHOLD;
  const areaFractionThreshold = options.areaFractionThreshold ?? DEFAULT_AREA_FRACTION_THRESHOLD;
  const dimensionsMatch = a.width === b.width && a.height === b.height;

  if (!dimensionsMatch && (options.shortCircuitOnDimensionMismatch ?? true)) {
    return { changed: true, changeRatio: 1, dimensionsMatch };
  }

  const ratio = changeRatio(a, b, pixelThreshold);
  return { changed: ratio > areaFractionThreshold, changeRatio: ratio, dimensionsMatch };
}

export function significantChange(
  a: Image,
  b: Image,
  pixelThreshold: number = DEFAULT_PIXEL_THRESHOLD,
  areaFractionThreshold: number = DEFAULT_AREA_FRACTION_THRESHOLD,
): boolean {
  return compareImages(a, b, { pixelThreshold, areaFractionThreshold }).changed;
}

/**
 * The first right-angle rotation of `a` that reproduces `b` within
 * `rotationThreshold`, or null.
 */
export function detectRotation(a: Image, b: Image, options: RotationOptions = {}): Rotation | null {
  const pixelThreshold = options.pixelThreshold ?? DEFAULT_PIXEL_THRESHOLD;
  const rotationThreshold = options.rotationThreshold ?? DEFAULT_ROTATION_THRESHOLD;
  const gray = toGrayscale(a);

  for (const degrees of ROTATIONS) {
    if (changeRatio(rotate(gray, degrees), b, pixelThreshold) <= rotationThreshold) {
      return degrees;
    }
  }
  return null;
}

/**
 * True when `b` is `a` rotated by a right angle. Check this before
 * {@link significantChange}: a rotated screen differs in almost every pixel.
 */
export function isRotationOnly(a: Image, b: Image, options: RotationOptions = {}): boolean {
  return detectRotation(a, b, options) !== null;
}
