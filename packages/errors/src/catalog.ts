/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the droidprobe packages. Each code maps to a
 * behavioral base type and a domain.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Dependency unavailable",
    description: "An external dependency is temporarily unavailable",
  },

  // ============================================================================
  // RESOURCE / VALIDATION ERRORS
  // ============================================================================
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Resource not found",
    description: "The requested file or directory does not exist",
  },
  VALIDATION_FAILED: {
    domain: "validation",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },

  // ============================================================================
  // VISION ERRORS - Image decoding and comparison
  // ============================================================================
  VISION_DECODE_FAILED: {
    domain: "vision",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Image decode failed",
    description: "The image could not be read or is not a valid PNG",
  },
  VISION_HASH_MISMATCH: {
    domain: "vision",
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Incompatible fingerprints",
    description: "Fingerprints of different sizes cannot be compared",
  },

  // ============================================================================
  // DEVICE ERRORS - Transport and capture
  // ============================================================================
  DEVICE_COMMAND_FAILED: {
    domain: "device",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Device command failed",
    description: "A device transport command returned a failure",
  },
  DEVICE_CAPTURE_FAILED: {
    domain: "device",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Screen capture failed",
    description: "Every capture strategy failed across the retry budget",
  },

  // ============================================================================
  // MONITOR ERRORS - Data-loss monitoring
  // ============================================================================
  MONITOR_CONFIGURATION_INVALID: {
    domain: "monitor",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid monitor configuration",
    description: "The data-loss monitor configuration is invalid",
  },
  MONITOR_INCIDENT_WRITE_FAILED: {
    domain: "monitor",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Incident write failed",
    description: "An incident bundle could not be persisted",
  },

  // ============================================================================
  // PERTURBATION ERRORS - Rotation, power cycle, home probe
  // ============================================================================
  PERTURBATION_CONFIGURATION_INVALID: {
    domain: "perturbation",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid perturbation configuration",
    description: "The perturbation coordinator configuration is invalid",
  },
  PERTURBATION_PROBE_FAILED: {
    domain: "perturbation",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Home probe failed",
    description: "A step of the home-button probe sequence failed",
  },

  // ============================================================================
  // SESSION ERRORS - Orchestration
  // ============================================================================
  SESSION_CONFIGURATION_INVALID: {
    domain: "session",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid session configuration",
    description: "The session configuration is invalid",
  },
  SESSION_CONFIG_NOT_FOUND: {
    domain: "session",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Session config file not found",
    description: "The session configuration file does not exist",
  },
  SESSION_FATAL: {
    domain: "session",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Session aborted",
    description: "An unrecoverable orchestrator failure aborted the session",
  },
  SESSION_DRIVER_LAUNCH_FAILED: {
    domain: "session",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Driver launch failed",
    description: "The UI exploration driver process could not be started",
  },

  // ============================================================================
  // ANALYSIS ERRORS - Offline artifact analysis
  // ============================================================================
  ANALYSIS_DIRECTORY_NOT_FOUND: {
    domain: "analysis",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Artifact directory not found",
    description: "The directory holding session artifacts does not exist",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
