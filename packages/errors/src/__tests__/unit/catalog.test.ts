import { describe, expect, it } from "vitest";
import {
  ERROR_CATALOG,
  getAllErrorCodes,
  getErrorCodesByDomain,
  getErrorMessage,
  InternalError,
  isExpectedError,
  isValidErrorCode,
  MonitorConfigurationError,
  NotFoundError,
  SessionFatalError,
  validateCatalog,
  wrapError,
} from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("is internally consistent", () => {
    expect(validateCatalog()).toEqual({ valid: true, errors: [] });
  });

  it("lists every code", () => {
    expect(getAllErrorCodes()).toHaveLength(Object.keys(ERROR_CATALOG).length);
  });

  it("groups codes by domain", () => {
    expect(getErrorCodesByDomain("perturbation")).toEqual([
      "PERTURBATION_CONFIGURATION_INVALID",
      "PERTURBATION_PROBE_FAILED",
    ]);
  });

  it("validates code strings", () => {
    expect(isValidErrorCode("VISION_DECODE_FAILED")).toBe(true);
    expect(isValidErrorCode("NOPE")).toBe(false);
    expect(isValidErrorCode("toString")).toBe(false);
  });
});

describe("utilities", () => {
  it("wrapError passes catalogued errors through", () => {
    const error = new MonitorConfigurationError("intervalMs must be positive");
    expect(wrapError(error)).toBe(error);
  });

  it("wrapError wraps native errors as InternalError", () => {
    const wrapped = wrapError(new TypeError("boom"));
    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
  });

  it("wrapError handles non-error values", () => {
    expect(wrapError("text").message).toBe("text");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });

  it("getErrorMessage handles all shapes", () => {
    expect(getErrorMessage(new Error("a"))).toBe("a");
    expect(getErrorMessage("b")).toBe("b");
    expect(getErrorMessage({})).toBe("An unknown error occurred");
  });

  it("isExpectedError follows the catalog flag", () => {
    expect(isExpectedError(new NotFoundError("missing"))).toBe(true);
    expect(isExpectedError(new MonitorConfigurationError("intervalMs must be positive"))).toBe(true);
    expect(isExpectedError(new SessionFatalError("driver vanished"))).toBe(false);
    expect(isExpectedError(new Error("plain"))).toBe(false);
    expect(isExpectedError(null)).toBe(false);
  });

  it("has no deadline code", () => {
    expect(isValidErrorCode("INTERNAL_TIMEOUT")).toBe(false);
    expect(new Set(Object.values(ERROR_CATALOG).map((entry) => entry.baseType))).toEqual(
      new Set(["InternalError", "ExternalError", "NotFoundError", "ValidationError"]),
    );
  });
});
