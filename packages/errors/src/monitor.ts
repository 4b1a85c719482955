import { DroidprobeError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Abstract base class for data-loss monitor errors.
 */
export abstract class MonitorError extends DroidprobeError {}

/**
 * Thrown when the data-loss monitor configuration is invalid.
 */
export class MonitorConfigurationError extends MonitorError {
  readonly _tag = "ValidationError" as const;
  readonly code = "MONITOR_CONFIGURATION_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string) {
    super(`Invalid monitor configuration: ${message}`);
    const entry = ERROR_CATALOG.MONITOR_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

/**
 * Thrown when an incident bundle cannot be written to disk.
 */
export class IncidentWriteError extends MonitorError {
  readonly _tag = "ExternalError" as const;
  readonly code = "MONITOR_INCIDENT_WRITE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly directory: string;

  constructor(directory: string, cause?: Error) {
    super(
      `Failed to persist incident to ${directory}: ${cause?.message ?? "unknown error"}`,
      { directory },
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.MONITOR_INCIDENT_WRITE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.directory = directory;
  }
}
