import { DroidprobeError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all vision errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for image decoding and comparison errors.
 *
 * Enables generic catch: `if (e instanceof VisionError)`
 * while specific subclasses allow precise handling.
 */
export abstract class VisionError extends DroidprobeError {}

// ---------------------------------------------------------------------------
// Decode failed
// ---------------------------------------------------------------------------

/**
 * Thrown when an image cannot be read from disk or decoded as PNG.
 */
export class ImageDecodeError extends VisionError {
  readonly _tag = "ValidationError" as const;
  readonly code = "VISION_DECODE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly source: string;

  constructor(source: string, reason: string, cause?: Error) {
    super(
      `Cannot decode image ${source}: ${reason}`,
      { source },
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.VISION_DECODE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.source = source;
  }
}

// ---------------------------------------------------------------------------
// Hash size mismatch
// ---------------------------------------------------------------------------

/**
 * Thrown when two fingerprints of different bit widths are compared.
 */
export class HashSizeMismatchError extends VisionError {
  readonly _tag = "ValidationError" as const;
  readonly code = "VISION_HASH_MISMATCH" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(leftBits: number, rightBits: number) {
    super(`Cannot compare a ${leftBits}-bit fingerprint with a ${rightBits}-bit fingerprint`);
    const entry = ERROR_CATALOG.VISION_HASH_MISMATCH;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
