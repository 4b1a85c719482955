import * as childProcess from "node:child_process";
import { EventEmitter } from "node:events";
import { DriverLaunchError } from "@droidprobe/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveSessionConfig } from "../config.js";
import { buildDriverArgs, SpawnDriverLauncher } from "../driver.js";
import { recordingLogger } from "./helpers.js";

vi.mock("node:child_process");

const mockedSpawn = vi.mocked(childProcess.spawn);

class FakeChild extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  readonly pid = 4321;
  readonly kill = vi.fn((_signal?: NodeJS.Signals) => true);
}

function useChild(): FakeChild {
  const child = new FakeChild();
  mockedSpawn.mockReturnValue(child as unknown as childProcess.ChildProcess);
  return child;
}

describe("buildDriverArgs", () => {
  it("should pass apk and output directory", () => {
    expect(buildDriverArgs(resolveSessionConfig({ apk: "notes.apk", outputDir: "out" }))).toEqual([
      "-a",
      "notes.apk",
      "-o",
      "out",
    ]);
  });

  it("should add serial, flags and extra arguments in order", () => {
    const config = resolveSessionConfig({
      apk: "notes.apk",
      outputDir: "out",
      serial: "emulator-5554",
      driver: { keepEnv: true, grantPermissions: true, extraArgs: ["-policy", "dfs_greedy"] },
    });

    expect(buildDriverArgs(config)).toEqual([
      "-a",
      "notes.apk",
      "-o",
      "out",
      "-d",
      "emulator-5554",
      "-keep_env",
      "-grant_perm",
      "-policy",
      "dfs_greedy",
    ]);
  });
});

describe("SpawnDriverLauncher", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("should resolve once the process has spawned", async () => {
    const child = useChild();
    const launcher = new SpawnDriverLauncher();

    const pending = launcher.launch({ command: "droidbot", args: ["-a", "notes.apk"] });
    child.emit("spawn");
    const driver = await pending;

    expect(driver.pid).toBe(4321);
    expect(driver.running).toBe(true);
    expect(mockedSpawn).toHaveBeenCalledWith(
      "droidbot",
      ["-a", "notes.apk"],
      expect.objectContaining({ stdio: ["ignore", "pipe", "pipe"] }),
    );
  });

  it("should reject with DriverLaunchError when the binary is missing", async () => {
    const child = useChild();
    const launcher = new SpawnDriverLauncher();

    const pending = launcher.launch({ command: "droidbot", args: [] });
    child.emit("error", Object.assign(new Error("spawn droidbot ENOENT"), { code: "ENOENT" }));

    await expect(pending).rejects.toBeInstanceOf(DriverLaunchError);
    await expect(pending).rejects.toThrow('Failed to launch driver "droidbot": spawn droidbot ENOENT');
  });

  it("should report the exit once the process ends", async () => {
    const child = useChild();
    const pending = new SpawnDriverLauncher().launch({ command: "droidbot", args: [] });
    child.emit("spawn");
    const driver = await pending;

    child.emit("exit", 0, null);

    expect(await driver.exited).toEqual({ exitCode: 0, signal: null });
    expect(driver.running).toBe(false);
    expect(await driver.terminate(1_000)).toEqual({ exitCode: 0, signal: null });
    expect(child.kill).not.toHaveBeenCalled();
  });

  it("should terminate with SIGTERM", async () => {
    const child = useChild();
    const pending = new SpawnDriverLauncher().launch({ command: "droidbot", args: [] });
    child.emit("spawn");
    const driver = await pending;

    const terminated = driver.terminate(5_000);
    expect(child.kill).toHaveBeenCalledWith("SIGTERM");
    child.emit("exit", null, "SIGTERM");

    expect(await terminated).toEqual({ exitCode: null, signal: "SIGTERM" });
    expect(child.kill).toHaveBeenCalledTimes(1);
  });

  it("should escalate to SIGKILL after the grace period", async () => {
    vi.useFakeTimers();
    const child = useChild();
    const pending = new SpawnDriverLauncher().launch({ command: "droidbot", args: [] });
    child.emit("spawn");
    const driver = await pending;

    const terminated = driver.terminate(5_000);
    vi.advanceTimersByTime(4_999);
    expect(child.kill).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(1);
    expect(child.kill).toHaveBeenLastCalledWith("SIGKILL");
    child.emit("exit", null, "SIGKILL");

    expect(await terminated).toEqual({ exitCode: null, signal: "SIGKILL" });
  });

  it("should forward driver output to the logger line by line", async () => {
    const child = useChild();
    const logger = recordingLogger();
    const pending = new SpawnDriverLauncher(logger).launch({ command: "droidbot", args: [] });
    child.emit("spawn");
    await pending;

    child.stdout.emit("data", Buffer.from("line one\nline"));
    child.stdout.emit("data", Buffer.from(" two\n\n"));
    child.stderr.emit("data", Buffer.from("warning: slow device\n"));

    expect(logger.messages("debug")).toEqual(["line one", "line two", "warning: slow device"]);
    expect(logger.messages("info")).toEqual(["started droidbot (pid 4321)"]);
  });
});
