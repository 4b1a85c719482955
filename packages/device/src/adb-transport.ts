/**
 * AdbTransport: runs `adb [-s serial] <args>` as a child process.
 *
 * Never throws. A deadline or caller abort sends SIGTERM, then SIGKILL after
 * a grace period; the result reports `timedOut` when the deadline fired.
 * A missing adb binary is warned about once per transport.
 */

import { spawn } from "node:child_process";
import type { CommandResult, DeviceTransport, ExecuteOptions, Logger } from "@droidprobe/core";
import { silentLogger } from "@droidprobe/core";
import { DEFAULT_ADB_PATH, DEFAULT_KILL_GRACE_MS } from "./constants.js";

export interface AdbTransportOptions {
  readonly adbPath?: string;
  /** Device serial passed as `-s <serial>`. */
  readonly serial?: string | undefined;
  readonly killGraceMs?: number;
  readonly logger?: Logger;
}

function failed(error: string, timedOut = false): CommandResult {
  return { ok: false, exitCode: null, stdout: Buffer.alloc(0), stderr: "", timedOut, error };
}

export class AdbTransport implements DeviceTransport {
  private readonly adbPath: string;
  private readonly serial: string | undefined;
  private readonly killGraceMs: number;
  private readonly logger: Logger;
  private missingBinaryReported = false;

  constructor(options: AdbTransportOptions = {}) {
    this.adbPath = options.adbPath ?? DEFAULT_ADB_PATH;
    this.serial = options.serial;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /** Full argument vector including the serial selector. */
  argv(args: readonly string[]): string[] {
    return this.serial ? ["-s", this.serial, ...args] : [...args];
  }

  execute(args: readonly string[], options: ExecuteOptions): Promise<CommandResult> {
    if (options.signal?.aborted) {
      return Promise.resolve(failed("aborted before start"));
    }

    const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
    const combinedSignal = options.signal
      ? AbortSignal.any([timeoutSignal, options.signal])
      : timeoutSignal;

    return new Promise<CommandResult>((resolve) => {
      const child = spawn(this.adbPath, this.argv(args), { stdio: ["ignore", "pipe", "pipe"] });

      const stdoutChunks: Buffer[] = [];
      let stderr = "";
      let timedOut = false;
      let killed = false;

      child.stdout?.on("data", (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf-8");
      });

      const onAbort = (): void => {
        if (killed) return;
        killed = true;
        timedOut = timeoutSignal.aborted;

        child.kill("SIGTERM");
        const killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill("SIGKILL");
          }
        }, this.killGraceMs);
        killTimer.unref();
      };

      combinedSignal.addEventListener("abort", onAbort, { once: true });

      child.on("error", (error: NodeJS.ErrnoException) => {
        combinedSignal.removeEventListener("abort", onAbort);
        if (error.code === "ENOENT" && !this.missingBinaryReported) {
          this.missingBinaryReported = true;
          this.logger.warn(`adb binary not found at "${this.adbPath}"; device commands will fail`);
        }
        resolve(failed(`failed to start ${this.adbPath}: ${error.message}`));
      });

      child.on("close", (exitCode) => {
        combinedSignal.removeEventListener("abort", onAbort);
        const stdout = Buffer.concat(stdoutChunks);
        if (killed) {
          resolve({
            ok: false,
            exitCode,
            stdout,
            stderr,
            timedOut,
            error: timedOut ? `timed out after ${options.timeoutMs}ms` : "aborted",
          });
          return;
        }
        const ok = exitCode === 0;
        resolve({
          ok,
          exitCode,
          stdout,
          stderr,
          timedOut: false,
          ...(ok ? {} : { error: stderr.trim() || `exit code ${exitCode ?? "none"}` }),
        });
      });
    });
  }
}
