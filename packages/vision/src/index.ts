export {
  DEFAULT_AREA_FRACTION_THRESHOLD,
  DEFAULT_HASH_SIZE,
  DEFAULT_PIXEL_THRESHOLD,
  DEFAULT_ROTATION_THRESHOLD,
} from "./constants.js";
export {
  type CompareOptions,
  type CompareResult,
  changeRatio,
  compareImages,
  detectRotation,
  isRotationOnly,
  type RotationOptions,
  significantChange,
} from "./diff.js";
export { fingerprint, fingerprintFile, hashDistance, PerceptualHash } from "./hash.js";
export {
  decodePng,
  type GrayImage,
  hasPngSignature,
  type Image,
  loadImage,
  type RgbaImage,
  toGrayscale,
} from "./image.js";
export { areaAverage, type Rotation, resample, rotate } from "./transform.js";
