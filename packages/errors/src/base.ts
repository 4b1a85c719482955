import type { ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Serialized shape of a {@link DroidprobeError}.
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata?: Record<string, string>;
  readonly timestamp: string;
  readonly cause?: string;
}

/**
 * Root of the droidprobe error hierarchy.
 *
 * Every concrete error carries a catalog `code`; `domain` and `isExpected`
 * are looked up from {@link ERROR_CATALOG} by the subclass.
 */
export abstract class DroidprobeError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      timestamp: this.timestamp.toISOString(),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Check if a value is a native Error (or subclass).
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Check if a value is a DroidprobeError.
 */
export function isDroidprobeError(value: unknown): value is DroidprobeError {
  return value instanceof DroidprobeError;
}
