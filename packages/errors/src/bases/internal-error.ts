import { DroidprobeError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DroidprobeErrorOptions, InternalCodes } from "../types.js";

/**
 * Errors caused by bugs or unrecoverable orchestrator failures.
 * The `.code` field discriminates the specific error.
 */
export class InternalError extends DroidprobeError {
  readonly _tag = "InternalError" as const;
  override readonly code: InternalCodes;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(
    messageOrOptions: string | DroidprobeErrorOptions<InternalCodes>,
    metadata?: Record<string, string>,
  ) {
    const opts =
      typeof messageOrOptions === "string"
        ? {
            code: "INTERNAL_ERROR" as const,
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
