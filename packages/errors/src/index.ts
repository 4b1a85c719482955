/**
 * @droidprobe/errors
 *
 * Shared error taxonomy for droidprobe.
 *
 * The error system is built on 4 behavioral base types:
 * ValidationError, NotFoundError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { DroidprobeError, type ErrorJSON, isDroidprobeError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  toError,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError } from "./bases/external-error.js";
export { InternalError } from "./bases/internal-error.js";
export { NotFoundError } from "./bases/not-found-error.js";
export { ValidationError } from "./bases/validation-error.js";

export type { DroidprobeErrorOptions } from "./types.js";

export { isExpectedError } from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { CaptureFailedError, DeviceCommandError, DeviceError } from "./device.js";
export { IncidentWriteError, MonitorConfigurationError, MonitorError } from "./monitor.js";
export {
  PerturbationConfigurationError,
  PerturbationError,
  ProbeFailedError,
} from "./perturbation.js";
export {
  DriverLaunchError,
  SessionConfigNotFoundError,
  SessionConfigurationError,
  SessionError,
  SessionFatalError,
} from "./session.js";
export { HashSizeMismatchError, ImageDecodeError, VisionError } from "./vision.js";
