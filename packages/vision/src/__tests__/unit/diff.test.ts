import { describe, expect, it } from "vitest";
import {
  changeRatio,
  compareImages,
  detectRotation,
  isRotationOnly,
  significantChange,
} from "../../diff.js";
import { rotate } from "../../transform.js";
import { cornerBlock, makeImage } from "./helpers.js";

describe("changeRatio", () => {
  it("should be zero for identical images", () => {
    const image = cornerBlock(30, 60);
    expect(changeRatio(image, image, 30)).toBe(0);
  });

  it("should count pixels above the intensity threshold", () => {
    const a = makeImage(10, 10, () => 0);
    // 25 of 100 pixels change by 100, 25 by only 20.
    const b = makeImage(10, 10, (x, y) => (y < 5 ? (x < 5 ? 100 : 20) : 0));
    expect(changeRatio(a, b, 30)).toBe(0.25);
  });

  it("should resample the second image onto the first grid", () => {
    const small = makeImage(10, 10, () => 200);
    const large = makeImage(20, 20, () => 200);
    expect(changeRatio(small, large, 30)).toBe(0);
  });
});

describe("compareImages", () => {
  it("should never flag an image against itself", () => {
    const image = cornerBlock(40, 80);
    expect(compareImages(image, image)).toEqual({
      changed: false,
      changeRatio: 0,
      dimensionsMatch: true,
    });
    expect(significantChange(image, image, 30, 0.15)).toBe(false);
  });

  it("should flag changes above the area threshold", () => {
    const a = makeImage(10, 10, () => 0);
    const b = makeImage(10, 10, (_x, y) => (y < 2 ? 255 : 0));
    expect(compareImages(a, b, { areaFractionThreshold: 0.15 }).changed).toBe(true);
    expect(compareImages(a, b, { areaFractionThreshold: 0.25 }).changed).toBe(false);
  });

  it("should short-circuit on dimension mismatch by default", () => {
    const a = makeImage(10, 20, () => 0);
    const b = makeImage(20, 10, () => 0);
    expect(compareImages(a, b)).toEqual({ changed: true, changeRatio: 1, dimensionsMatch: false });
  });

  it("should compare pixels across sizes when short-circuit is disabled", () => {
    const a = makeImage(10, 10, () => 90);
    const b = makeImage(5, 5, () => 90);
    expect(compareImages(a, b, { shortCircuitOnDimensionMismatch: false })).toEqual({
      changed: false,
      changeRatio: 0,
      dimensionsMatch: false,
    });
  });
});

describe("rotation detection", () => {
  const portrait = cornerBlock(40, 80);

  it.each([90, 180, 270] as const)("should recognise an exact %d degree rotation", (degrees) => {
    const rotated = rotate(portrait, degrees);
    expect(detectRotation(portrait, rotated)).toBe(degrees);
    expect(isRotationOnly(portrait, rotated)).toBe(true);
  });

  it("should not treat a rotation as data loss once classified", () => {
    const landscape = rotate(portrait, 90);
    expect(isRotationOnly(portrait, landscape)).toBe(true);
    expect(significantChange(portrait, landscape)).toBe(true);
  });

  it("should reject unrelated screens", () => {
    const other = makeImage(80, 40, (x) => (x > 60 ? 255 : 0));
    expect(detectRotation(portrait, other)).toBeNull();
  });
});
