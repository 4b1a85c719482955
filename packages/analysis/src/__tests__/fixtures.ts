import { createImage } from "@droidprobe/test-utils";
import type { RgbaImage } from "@droidprobe/vision";

// 16x16 screens whose 8x8 average hashes are known:
// LAUNCHER f0f0f0f0f0f0f0f0, FORM ffffffff00000000 (distance 32), LIST 0f0f0f0f0f0f0f0f (distance 64).
export const LAUNCHER: RgbaImage = createImage(16, 16, (x) => (x < 8 ? 255 : 0));
export const FORM: RgbaImage = createImage(16, 16, (_x, y) => (y < 8 ? 255 : 0));
export const LIST: RgbaImage = createImage(16, 16, (x) => (x < 8 ? 0 : 255));
