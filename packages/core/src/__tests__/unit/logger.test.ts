import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, silentLogger } from "../../logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should prefix lines with the tag", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger("monitor");

    logger.warn("capture failed");

    expect(warn).toHaveBeenCalledWith("[monitor] capture failed");
  });

  it("should append fields and skip undefined values", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = createConsoleLogger("session");

    logger.info("tick", { tick: 3, phase: "sampling", skipped: undefined });

    expect(info).toHaveBeenCalledWith("[session] tick (tick=3, phase=sampling)");
  });

  it("should drop lines below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    createConsoleLogger("x").debug("hidden");
    createConsoleLogger("x", { level: "warn" }).info("hidden too");
    createConsoleLogger("x", { level: "debug" }).debug("shown");

    expect(info).not.toHaveBeenCalled();
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[x] shown");
  });

  it("should nest child tags", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger("session").child("rotation").error("stuck");
    expect(error).toHaveBeenCalledWith("[session:rotation] stuck");
  });
});

describe("silentLogger", () => {
  it("should write nothing", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    silentLogger.child("a").warn("nothing");
    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });
});
