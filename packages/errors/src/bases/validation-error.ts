import { DroidprobeError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DroidprobeErrorOptions, ValidationCodes } from "../types.js";

/**
 * Errors caused by invalid input, configuration, or artifact data.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError extends DroidprobeError {
  readonly _tag = "ValidationError" as const;
  override readonly code: ValidationCodes;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(messageOrOptions: string | DroidprobeErrorOptions<ValidationCodes>) {
    const opts =
      typeof messageOrOptions === "string"
        ? {
            code: "VALIDATION_FAILED" as const,
            message: messageOrOptions,
            metadata: undefined,
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
