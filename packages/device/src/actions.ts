/**
 * DeviceActions: the adb commands droidprobe issues, on top of a transport.
 */

import type { CommandResult, DeviceTransport, Logger } from "@droidprobe/core";
import { silentLogger } from "@droidprobe/core";
import { DeviceCommandError } from "@droidprobe/errors";
import { componentName, parseForegroundActivity } from "./activity.js";
import { DEFAULT_COMMAND_TIMEOUT_MS, UNLOCK_SWIPE } from "./constants.js";

export type Orientation = "portrait" | "landscape";

export interface DeviceActionsOptions {
  readonly commandTimeoutMs?: number;
  readonly logger?: Logger;
}

export class DeviceActions {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    readonly transport: DeviceTransport,
    options: DeviceActionsOptions = {},
  ) {
    this.timeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run a command that must succeed.
   *
   * @throws {DeviceCommandError} when the command fails or times out
   */
  async run(args: readonly string[], signal?: AbortSignal): Promise<CommandResult> {
    const result = await this.transport.execute(args, { timeoutMs: this.timeoutMs, signal });
    if (!result.ok) {
      throw new DeviceCommandError(args, result.exitCode, result.error ?? "command failed");
    }
    return result;
  }

  pressKey(keycode: string, signal?: AbortSignal): Promise<CommandResult> {
    return this.run(["shell", "input", "keyevent", keycode], signal);
  }

  swipe(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    durationMs: number,
    signal?: AbortSignal,
  ): Promise<CommandResult> {
    return this.run(
      ["shell", "input", "swipe", String(x1), String(y1), String(x2), String(y2), String(durationMs)],
      signal,
    );
  }

  unlockSwipe(signal?: AbortSignal): Promise<CommandResult> {
    const { x1, y1, x2, y2, durationMs } = UNLOCK_SWIPE;
    return this.swipe(x1, y1, x2, y2, durationMs, signal);
  }

  startActivity(packageName: string, activity: string, signal?: AbortSignal): Promise<CommandResult> {
    return this.run(["shell", "am", "start", "-n", componentName(packageName, activity)], signal);
  }

  /** Emulator console rotation. */
  rotate(orientation: Orientation, signal?: AbortSignal): Promise<CommandResult> {
    return this.run(["emu", "rotate", orientation], signal);
  }

  /**
   * Resumed `package/activity`, or null when it cannot be determined.
   * Never throws.
   */
  async foregroundActivity(signal?: AbortSignal): Promise<string | null> {
    const result = await this.transport.execute(["shell", "dumpsys", "activity", "activities"], {
      timeoutMs: this.timeoutMs,
      signal,
    });
    if (!result.ok) {
      this.logger.debug(`dumpsys failed: ${result.error ?? "unknown error"}`);
      return null;
    }
    return parseForegroundActivity(result.stdout.toString("utf-8"));
  }

  /**
   * UI hierarchy XML, or null. Never throws.
   */
  async dumpViewTree(signal?: AbortSignal): Promise<string | null> {
    const result = await this.transport.execute(["exec-out", "uiautomator", "dump", "/dev/tty"], {
      timeoutMs: this.timeoutMs,
      signal,
    });
    if (!result.ok) {
      this.logger.debug(`uiautomator dump failed: ${result.error ?? "unknown error"}`);
      return null;
    }
    const text = result.stdout.toString("utf-8");
    const start = text.indexOf("<?xml");
    const end = text.lastIndexOf("</hierarchy>");
    if (start === -1 || end === -1) return null;
    return text.slice(start, end + "</hierarchy>".length);
  }
}
