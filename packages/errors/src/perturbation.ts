import { DroidprobeError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Abstract base class for perturbation errors.
 */
export abstract class PerturbationError extends DroidprobeError {}

/**
 * Thrown when the perturbation configuration is invalid.
 */
export class PerturbationConfigurationError extends PerturbationError {
  readonly _tag = "ValidationError" as const;
  readonly code = "PERTURBATION_CONFIGURATION_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string) {
    super(`Invalid perturbation configuration: ${message}`);
    const entry = ERROR_CATALOG.PERTURBATION_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

/**
 * Thrown when a step of the home-button probe fails.
 */
export class ProbeFailedError extends PerturbationError {
  readonly _tag = "ExternalError" as const;
  readonly code = "PERTURBATION_PROBE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly probeIndex: number;
  readonly step: string;

  constructor(probeIndex: number, step: string, detail: string, cause?: Error) {
    super(
      `Home probe #${probeIndex} failed at "${step}": ${detail}`,
      { probeIndex: String(probeIndex), step },
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.PERTURBATION_PROBE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.probeIndex = probeIndex;
    this.step = step;
  }
}
