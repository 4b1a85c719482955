import { DroidprobeError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Abstract base class for device transport and capture errors.
 */
export abstract class DeviceError extends DroidprobeError {}

/**
 * Thrown by callers that require a device command to succeed
 * (the transport itself never throws).
 */
export class DeviceCommandError extends DeviceError {
  readonly _tag = "ExternalError" as const;
  readonly code = "DEVICE_COMMAND_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly command: readonly string[];
  readonly exitCode: number | null;

  constructor(command: readonly string[], exitCode: number | null, detail: string) {
    super(`Device command "${command.join(" ")}" failed (exit ${exitCode ?? "none"}): ${detail}`, {
      command: command.join(" "),
    });
    const entry = ERROR_CATALOG.DEVICE_COMMAND_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.command = command;
    this.exitCode = exitCode;
  }
}

/**
 * Thrown when every capture strategy failed across the whole retry budget.
 */
export class CaptureFailedError extends DeviceError {
  readonly _tag = "ExternalError" as const;
  readonly code = "DEVICE_CAPTURE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly attempts: number;
  readonly strategyErrors: readonly string[];

  constructor(attempts: number, strategyErrors: readonly string[]) {
    super(
      `Screen capture failed after ${attempts} attempt(s): ${strategyErrors.join("; ") || "no strategies"}`,
    );
    const entry = ERROR_CATALOG.DEVICE_CAPTURE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.attempts = attempts;
    this.strategyErrors = strategyErrors;
  }
}
