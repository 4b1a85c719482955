import { SessionConfigurationError } from "@droidprobe/errors";
import { describe, expect, it } from "vitest";
import { applyCliOverrides, parseArgv } from "../args.js";

describe("parseArgv", () => {
  it("should split positionals, aliases and boolean flags", () => {
    expect(parseArgv(["app.apk", "-o", "out", "--no-rotate", "-t", "120"])).toEqual({
      positionals: ["app.apk"],
      flags: { output: "out", "no-rotate": true, timeout: "120" },
    });
  });

  it("should treat everything after -- as positional", () => {
    expect(parseArgv(["--", "-weird.apk"]).positionals).toEqual(["-weird.apk"]);
  });

  it("should mark a value flag without a value as true", () => {
    expect(parseArgv(["--serial", "--help"]).flags).toEqual({ serial: true, help: true });
  });
});

describe("applyCliOverrides", () => {
  it("should layer flags over the document", () => {
    const document = { monitor: { pixelThreshold: 20 }, rotation: { minIntervalMs: 1_000 } };
    const args = parseArgv(["x.apk", "--interval", "5", "--no-rotate", "--grant-perm", "-d", "emulator-5556"]);

    expect(applyCliOverrides(document, args)).toEqual({
      apk: "x.apk",
      serial: "emulator-5556",
      monitor: { pixelThreshold: 20, intervalMs: 5_000 },
      rotation: { minIntervalMs: 1_000, enabled: false },
      driver: { grantPermissions: true },
    });
  });

  it("should convert seconds to milliseconds", () => {
    expect(applyCliOverrides({}, parseArgv(["--timeout", "1.5"]))).toEqual({ timeoutMs: 1_500 });
  });

  it("should disable sections that the document does not mention", () => {
    expect(applyCliOverrides({ apk: "a.apk" }, parseArgv(["--no-monitor", "--no-home-probe"]))).toEqual({
      apk: "a.apk",
      monitor: { enabled: false },
      homeProbe: { enabled: false },
    });
  });

  it("should reject a timeout that is not a positive number", () => {
    expect(() => applyCliOverrides({}, parseArgv(["--timeout", "soon"]))).toThrow(
      '--timeout must be a positive number of seconds, got "soon"',
    );
  });

  it("should reject a value flag given without a value", () => {
    expect(() => applyCliOverrides({}, parseArgv(["a.apk", "--output"]))).toThrow(SessionConfigurationError);
  });

  it("should leave a non-mapping document for the schema to reject", () => {
    const document = ["not", "a", "mapping"];
    expect(applyCliOverrides(document, parseArgv(["a.apk"]))).toBe(document);
  });
});
