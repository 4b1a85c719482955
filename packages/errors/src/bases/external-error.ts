import { DroidprobeError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DroidprobeErrorOptions, ExternalCodes } from "../types.js";

/**
 * Errors caused by runtime failures in external dependencies (device, driver, filesystem).
 * The `.code` field discriminates the specific error.
 */
export class ExternalError extends DroidprobeError {
  readonly _tag = "ExternalError" as const;
  override readonly code: ExternalCodes;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(
    messageOrOptions: string | DroidprobeErrorOptions<ExternalCodes>,
    metadata?: Record<string, string>,
  ) {
    const opts =
      typeof messageOrOptions === "string"
        ? {
            code: "INTERNAL_UNAVAILABLE" as const,
            message: messageOrOptions,
            metadata,
            cause: undefined,
          }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
