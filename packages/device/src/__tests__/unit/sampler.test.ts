import { access, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ValidationError } from "@droidprobe/errors";
import {
  createTempDir,
  createTestClock,
  encodePng,
  FakeTransport,
  solidImage,
  type TempDir,
} from "@droidprobe/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SnapshotSampler } from "../../sampler.js";
import { emulatorConsole, execOutScreencap, shellScreencapPull } from "../../strategies.js";

const PNG_BYTES = encodePng(solidImage(4, 4, 200));
const DUMPSYS = "  mResumedActivity: ActivityRecord{1 u0 com.example.notes/.MainActivity t3}";

describe("SnapshotSampler", () => {
  let tmp: TempDir;

  beforeEach(async () => {
    tmp = await createTempDir("sampler-test-");
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it("should persist a time-ordered snapshot with its activity", async () => {
    const transport = new FakeTransport()
      .on("exec-out screencap", { stdout: PNG_BYTES })
      .on("shell dumpsys", { stdout: DUMPSYS });
    const clock = createTestClock(Date.UTC(2024, 0, 2, 3, 4, 5, 678));
    const sampler = new SnapshotSampler({ transport, outputDir: tmp.path, clock, scratchDir: tmp.path });

    const result = await sampler.capture();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { snapshot } = result;
    expect(snapshot.imagePath).toBe(
      join(tmp.path, "monitor_states", "snapshot_20240102T030405678_000001.png"),
    );
    expect(await readFile(snapshot.imagePath)).toEqual(PNG_BYTES);
    expect(snapshot.activity).toBe("com.example.notes/.MainActivity");
    expect(snapshot.viewTree).toBeNull();
    expect(snapshot.wallClock).toBe("2024-01-02T03:04:05.678Z");
    expect((await snapshot.fingerprint()).size).toBe(64);
    expect(sampler.captured).toBe(1);
  });

  it("should number successive snapshots", async () => {
    const transport = new FakeTransport().on("exec-out screencap", { stdout: PNG_BYTES });
    const sampler = new SnapshotSampler({ transport, outputDir: tmp.path, clock: createTestClock(0) });

    await sampler.capture();
    const second = await sampler.capture();

    expect(second.ok && second.snapshot.imagePath.endsWith("_000002.png")).toBe(true);
  });

  it("should fall back to screencap and pull when exec-out yields no PNG", async () => {
    const transport = new FakeTransport()
      .on("exec-out screencap", { stdout: "garbage" })
      .on("pull", async (args) => {
        await writeFile(args[2] ?? "", PNG_BYTES);
        return {};
      });
    const sampler = new SnapshotSampler({
      transport,
      outputDir: tmp.path,
      scratchDir: tmp.path,
      strategies: [execOutScreencap, shellScreencapPull("/sdcard/shot.png")],
    });

    const result = await sampler.capture();

    expect(result.ok).toBe(true);
    expect(transport.commands()).toContain("shell screencap -p /sdcard/shot.png");
    expect(transport.commands()).toContain("shell rm -f /sdcard/shot.png");
  });

  it("should read the emulator console screenshot from the host", async () => {
    const transport = new FakeTransport().on("emu screenrecord screenshot", async (args) => {
      await writeFile(args[3] ?? "", PNG_BYTES);
      return {};
    });
    const sampler = new SnapshotSampler({
      transport,
      outputDir: tmp.path,
      scratchDir: tmp.path,
      strategies: [emulatorConsole],
    });

    const result = await sampler.capture();
    expect(result.ok).toBe(true);
  });

  it("should retry the strategy list and report every error", async () => {
    const transport = new FakeTransport()
      .on("exec-out screencap", { exitCode: 1, error: "device offline" })
      .on("shell screencap", { exitCode: 1, error: "device offline" })
      .on("emu screenrecord", { exitCode: 1, error: "unknown command" });
    const sampler = new SnapshotSampler({
      transport,
      outputDir: tmp.path,
      scratchDir: tmp.path,
      retries: 2,
      backoffMs: 0,
    });

    const result = await sampler.capture();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.attempts).toBe(2);
    expect(result.failure.strategyErrors).toHaveLength(6);
    expect(result.failure.strategyErrors[0]).toBe("exec-out-screencap: device offline");
    expect(result.failure.strategyErrors[2]).toBe("emulator-console: unknown command");
    expect(transport.commandsMatching("exec-out screencap")).toHaveLength(2);
    expect(sampler.captured).toBe(0);
  });

  it("should succeed on a later attempt", async () => {
    const transport = new FakeTransport()
      .on("exec-out screencap", { exitCode: 1, error: "busy" }, 1)
      .on("exec-out screencap", { stdout: PNG_BYTES });
    const sampler = new SnapshotSampler({
      transport,
      outputDir: tmp.path,
      strategies: [execOutScreencap],
      retries: 3,
      backoffMs: 0,
    });

    const result = await sampler.capture();

    expect(result.ok).toBe(true);
    expect(transport.commandsMatching("exec-out screencap")).toHaveLength(2);
  });

  it("should stop without device calls when aborted", async () => {
    const transport = new FakeTransport();
    const sampler = new SnapshotSampler({ transport, outputDir: tmp.path });
    const controller = new AbortController();
    controller.abort();

    const result = await sampler.capture(controller.signal);

    expect(result.ok).toBe(false);
    expect(transport.calls).toHaveLength(0);
  });

  it("should capture to an explicit path", async () => {
    const transport = new FakeTransport().on("exec-out screencap", { stdout: PNG_BYTES });
    const sampler = new SnapshotSampler({ transport, outputDir: tmp.path });
    const path = join(tmp.path, "home_button_screenshots", "before_1.png");

    const result = await sampler.captureToFile(path);

    expect(result.ok).toBe(true);
    await expect(access(path)).resolves.toBeUndefined();
    expect(sampler.captured).toBe(0);
  });

  it("should attach the view tree when enabled", async () => {
    const transport = new FakeTransport()
      .on("exec-out screencap", { stdout: PNG_BYTES })
      .on("exec-out uiautomator", { stdout: "<?xml version='1.0'?><hierarchy></hierarchy>" });
    const sampler = new SnapshotSampler({ transport, outputDir: tmp.path, captureViewTree: true });

    const result = await sampler.capture();

    expect(result.ok && result.snapshot.viewTree).toBe("<?xml version='1.0'?><hierarchy></hierarchy>");
  });

  it("should reject invalid settings", () => {
    const transport = new FakeTransport();
    expect(() => new SnapshotSampler({ transport, outputDir: tmp.path, retries: 0 })).toThrow(
      ValidationError,
    );
    expect(() => new SnapshotSampler({ transport, outputDir: tmp.path, strategies: [] })).toThrow(
      ValidationError,
    );
  });
});
