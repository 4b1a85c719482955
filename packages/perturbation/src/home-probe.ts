/**
 * Home probe: screenshot, send the app to the background with HOME,
 * relaunch it, screenshot again. The before/after pairs are compared
 * offline by the home-probe loss analysis, and handed to the optional
 * sink as soon as they are taken.
 */

import { join } from "node:path";
import { type AppInfo, type Clock, defaultClock, type EventKind, type Logger, silentLogger, sleep } from "@droidprobe/core";
import type { CaptureResult, DeviceActions, Snapshot } from "@droidprobe/device";
import { getErrorMessage, ProbeFailedError, toError } from "@droidprobe/errors";
import { HOME_PROBE_DIRECTORY, HOME_PROBE_TRIGGERS, KEYCODE_HOME } from "./constants.js";
import type { ActionContext, HomeReturnSink, PerturbationAction } from "./types.js";

/** Anything that can write a screenshot to a given path, normally a `SnapshotSampler`. */
export interface ProbeCamera {
  captureToFile(path: string, signal?: AbortSignal): Promise<CaptureResult>;
}

export interface HomeProbeActionOptions {
  readonly app: AppInfo;
  readonly outputDir: string;
  readonly minIntervalMs: number;
  readonly maxProbes: number;
  readonly returnDelayMs: number;
  readonly settleMs: number;
  /** A failing sink is logged; the run still counts as a success. */
  readonly sink?: HomeReturnSink;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export type ProbeStep = "capture-before" | "press-home" | "relaunch" | "capture-after";

export class HomeProbeAction implements PerturbationAction {
  readonly name = "home_probe";
  readonly triggers: ReadonlySet<EventKind> = new Set(HOME_PROBE_TRIGGERS);
  readonly minIntervalMs: number;
  readonly maxAttempts: number;
  readonly directory: string;
  private readonly device: DeviceActions;
  private readonly camera: ProbeCamera;
  private readonly options: HomeProbeActionOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(device: DeviceActions, camera: ProbeCamera, options: HomeProbeActionOptions) {
    this.device = device;
    this.camera = camera;
    this.options = options;
    this.minIntervalMs = options.minIntervalMs;
    this.maxAttempts = options.maxProbes;
    this.directory = join(options.outputDir, HOME_PROBE_DIRECTORY);
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws {ProbeFailedError} naming the step that failed
   */
  async run({ signal, attempt }: ActionContext): Promise<void> {
    const { packageName, mainActivity } = this.options.app;

    const beforePath = join(this.directory, `before_${attempt}.png`);
    const before = await this.capture(attempt, "capture-before", beforePath, signal);
    await this.step(attempt, "press-home", () => this.device.pressKey(KEYCODE_HOME, signal));
    await sleep(this.options.returnDelayMs, this.clock, signal);
    await this.step(attempt, "relaunch", () => this.device.startActivity(packageName, mainActivity, signal));
    await sleep(this.options.settleMs, this.clock, signal);
    const afterPath = join(this.directory, `after_${attempt}.png`);
    const after = await this.capture(attempt, "capture-after", afterPath, signal);

    this.logger.info(`home probe #${attempt} completed`);
    if (this.options.sink !== undefined) {
      try {
        await this.options.sink.record({ attempt, before, after });
      } catch (error) {
        this.logger.warn(`could not record home return #${attempt}: ${getErrorMessage(error)}`);
      }
    }
  }

  private async step(attempt: number, step: ProbeStep, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      const cause = toError(error);
      throw new ProbeFailedError(attempt, step, cause.message, cause);
    }
  }

  private async capture(
    attempt: number,
    step: ProbeStep,
    path: string,
    signal: AbortSignal,
  ): Promise<Snapshot> {
    const result = await this.camera.captureToFile(path, signal);
    if (!result.ok) {
      throw new ProbeFailedError(attempt, step, result.failure.message, result.failure);
    }
    return result.snapshot;
  }
}
