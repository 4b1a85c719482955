import { DroidprobeError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DroidprobeErrorOptions, NotFoundCodes } from "../types.js";

/**
 * Errors raised when an expected file or directory is missing.
 * The `.code` field discriminates the specific error.
 */
export class NotFoundError extends DroidprobeError {
  readonly _tag = "NotFoundError" as const;
  override readonly code: NotFoundCodes;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(
    messageOrOptions: string | DroidprobeErrorOptions<NotFoundCodes>,
    metadata?: Record<string, string>,
  ) {
    const opts =
      typeof messageOrOptions === "string"
        ? {
            code: "RESOURCE_NOT_FOUND" as const,
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
