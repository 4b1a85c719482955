/**
 * Exploration driver supervision.
 *
 * The driver (DroidBot by default) runs as one child process per session.
 * `terminate` sends SIGTERM, then SIGKILL once the grace period runs out.
 */

import { type ChildProcess, spawn } from "node:child_process";
import type { Logger } from "@droidprobe/core";
import { silentLogger } from "@droidprobe/core";
import { DriverLaunchError } from "@droidprobe/errors";
import type { ResolvedSessionConfig } from "./types.js";

export interface DriverExit {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
}

export interface DriverCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export interface DriverProcess {
  readonly pid: number | undefined;
  /** Settles once the process has exited, however that happened. */
  readonly exited: Promise<DriverExit>;
  readonly running: boolean;
  terminate(graceMs: number): Promise<DriverExit>;
}

export interface DriverLauncher {
  launch(command: DriverCommand): Promise<DriverProcess>;
}

/**
 * `-a <apk> -o <output> [-d <serial>] [-keep_env] [-grant_perm] ...extraArgs`
 */
export function buildDriverArgs(
  config: Pick<ResolvedSessionConfig, "apk" | "outputDir" | "serial" | "driver">,
): string[] {
  const args = ["-a", config.apk, "-o", config.outputDir];
  if (config.serial !== null) args.push("-d", config.serial);
  if (config.driver.keepEnv) args.push("-keep_env");
  if (config.driver.grantPermissions) args.push("-grant_perm");
  args.push(...config.driver.extraArgs);
  return args;
}

function forwardLines(stream: NodeJS.ReadableStream | null, write: (line: string) => void): void {
  if (stream === null) return;
  let pending = "";
  stream.on("data", (chunk: Buffer) => {
    pending += chunk.toString("utf-8");
    const lines = pending.split("\n");
    pending = lines.pop() ?? "";
    for (const line of lines) {
      if (line.trim() !== "") write(line.trimEnd());
    }
  });
}

class SpawnedDriver implements DriverProcess {
  readonly exited: Promise<DriverExit>;
  private _exit: DriverExit | null = null;

  constructor(private readonly _child: ChildProcess) {
    this.exited = new Promise<DriverExit>((resolve) => {
      _child.once("exit", (exitCode, signal) => {
        this._exit = { exitCode, signal };
        resolve(this._exit);
      });
    });
  }

  get pid(): number | undefined {
    return this._child.pid;
  }

  get running(): boolean {
    return this._exit === null;
  }

  async terminate(graceMs: number): Promise<DriverExit> {
    if (this._exit !== null) return this._exit;

    const forceKill = setTimeout(() => {
      if (this._exit === null) this._child.kill("SIGKILL");
    }, graceMs);
    try {
      this._child.kill("SIGTERM");
      return await this.exited;
    } finally {
      clearTimeout(forceKill);
    }
  }
}

/**
 * Launches the driver with `child_process.spawn`. Resolves once the process
 * has started; a missing binary rejects with {@link DriverLaunchError}.
 */
export class SpawnDriverLauncher implements DriverLauncher {
  constructor(private readonly _logger: Logger = silentLogger) {}

  launch(command: DriverCommand): Promise<DriverProcess> {
    return new Promise<DriverProcess>((resolve, reject) => {
      const child = spawn(command.command, [...command.args], {
        stdio: ["ignore", "pipe", "pipe"],
      });
      const driver = new SpawnedDriver(child);

      forwardLines(child.stdout, (line) => this._logger.debug(line));
      forwardLines(child.stderr, (line) => this._logger.debug(line));

      let started = false;
      child.once("spawn", () => {
        started = true;
        this._logger.info(`started ${command.command} (pid ${child.pid ?? "?"})`);
        resolve(driver);
      });
      child.on("error", (error) => {
        if (started) {
          this._logger.warn(`driver process error: ${error.message}`);
        } else {
          reject(new DriverLaunchError(command.command, error));
        }
      });
    });
  }
}
