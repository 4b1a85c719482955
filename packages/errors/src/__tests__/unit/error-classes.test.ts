import { describe, expect, it } from "vitest";
import {
  CaptureFailedError,
  DroidprobeError,
  ExternalError,
  ImageDecodeError,
  InternalError,
  isDroidprobeError,
  isError,
  NotFoundError,
  ProbeFailedError,
  SessionConfigurationError,
  ValidationError,
} from "../../index.js";

describe("DroidprobeError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(DroidprobeError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.domain).toBe("internal");
    expect(error.isExpected).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should preserve stack traces", () => {
    const error = new InternalError("Stack test");
    expect(error.stack).toBeDefined();
    expect(error.stack).toContain("InternalError");
  });

  it("should support metadata", () => {
    const metadata = { device: "emulator-5554" };
    const error = new ExternalError("With metadata", metadata);

    expect(error.metadata).toEqual(metadata);
    expect(error.code).toBe("INTERNAL_UNAVAILABLE");
  });

  it("should accept explicit codes through options", () => {
    const error = new NotFoundError({
      code: "ANALYSIS_DIRECTORY_NOT_FOUND",
      message: "states directory missing",
    });

    expect(error.code).toBe("ANALYSIS_DIRECTORY_NOT_FOUND");
    expect(error.domain).toBe("analysis");
    expect(error.isExpected).toBe(true);
  });

  it("should serialize to JSON", () => {
    const cause = new Error("root cause");
    const error = new ValidationError({
      code: "VALIDATION_FAILED",
      message: "JSON test",
      metadata: { key: "value" },
      cause,
    });
    const json = error.toJSON();

    expect(json).toMatchObject({
      _tag: "ValidationError",
      name: "ValidationError",
      code: "VALIDATION_FAILED",
      message: "JSON test",
      domain: "validation",
      isExpected: true,
      metadata: { key: "value" },
      cause: "root cause",
    });
    expect(typeof json.timestamp).toBe("string");
  });
});

describe("domain errors", () => {
  it("ImageDecodeError carries its source", () => {
    const error = new ImageDecodeError("states/screen_1.png", "not a PNG");
    expect(error.message).toBe("Cannot decode image states/screen_1.png: not a PNG");
    expect(error.code).toBe("VISION_DECODE_FAILED");
    expect(error.source).toBe("states/screen_1.png");
    expect(error.domain).toBe("vision");
  });

  it("CaptureFailedError lists strategy errors", () => {
    const error = new CaptureFailedError(3, ["exec-out-screencap: timeout", "emulator-console: exit 1"]);
    expect(error.message).toBe(
      "Screen capture failed after 3 attempt(s): exec-out-screencap: timeout; emulator-console: exit 1",
    );
    expect(error.attempts).toBe(3);
  });

  it("ProbeFailedError records the failing step", () => {
    const cause = new Error("exit 1");
    const error = new ProbeFailedError(2, "relaunch", "am start failed", cause);
    expect(error.message).toBe('Home probe #2 failed at "relaunch": am start failed');
    expect(error.cause).toBe(cause);
    expect(error.metadata).toEqual({ probeIndex: "2", step: "relaunch" });
  });

  it("SessionConfigurationError joins issues", () => {
    const error = new SessionConfigurationError(["apk: required", "timeoutMs: too small"], "run.yaml");
    expect(error.message).toBe(
      "Invalid session configuration in run.yaml: apk: required; timeoutMs: too small",
    );
  });
});

describe("isError / isDroidprobeError", () => {
  it("distinguishes native errors from catalogued errors", () => {
    const native = new Error("plain");
    const ours = new InternalError("ours");

    expect(isError(native)).toBe(true);
    expect(isDroidprobeError(native)).toBe(false);
    expect(isDroidprobeError(ours)).toBe(true);
    expect(isError("string")).toBe(false);
  });
});
