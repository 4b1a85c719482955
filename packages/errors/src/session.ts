import { DroidprobeError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all session errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for session orchestration errors.
 */
export abstract class SessionError extends DroidprobeError {}

/**
 * Thrown when the session configuration fails validation.
 */
export class SessionConfigurationError extends SessionError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SESSION_CONFIGURATION_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[], source?: string) {
    const where = source ? ` in ${source}` : "";
    super(`Invalid session configuration${where}: ${issues.join("; ")}`);
    const entry = ERROR_CATALOG.SESSION_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

/**
 * Thrown when a session config file does not exist.
 */
export class SessionConfigNotFoundError extends SessionError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "SESSION_CONFIG_NOT_FOUND" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly path: string;

  constructor(path: string) {
    super(`Session config file not found: ${path}`, { path });
    const entry = ERROR_CATALOG.SESSION_CONFIG_NOT_FOUND;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.path = path;
  }
}

/**
 * Thrown when the exploration driver process cannot be started.
 */
export class DriverLaunchError extends SessionError {
  readonly _tag = "ExternalError" as const;
  readonly code = "SESSION_DRIVER_LAUNCH_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(command: string, cause?: Error) {
    super(
      `Failed to launch driver "${command}": ${cause?.message ?? "unknown error"}`,
      { command },
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.SESSION_DRIVER_LAUNCH_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

/**
 * Thrown when an unrecoverable orchestrator failure aborts the session.
 */
export class SessionFatalError extends SessionError {
  readonly _tag = "InternalError" as const;
  readonly code = "SESSION_FATAL" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string, cause?: Error) {
    super(`Session aborted: ${message}`, undefined, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.SESSION_FATAL;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
