import { type Clock, defaultClock, type EventKind, type Logger, silentLogger, sleep } from "@droidprobe/core";
import type { DeviceActions } from "@droidprobe/device";
import { ROTATION_TRIGGERS } from "./constants.js";
import type { ActionContext, PerturbationAction } from "./types.js";

export type RotationStep = "portrait" | "landscape" | "reverse_portrait" | "reverse_landscape";

/** Where the next run heads from each orientation. */
const NEXT_STEP: Readonly<Record<RotationStep, RotationStep>> = {
  portrait: "landscape",
  landscape: "reverse_landscape",
  reverse_portrait: "reverse_landscape",
  reverse_landscape: "portrait",
};

/** Orientation after one `landscape` console command. */
const QUARTER_TURN: Readonly<Record<RotationStep, RotationStep>> = {
  portrait: "landscape",
  landscape: "reverse_portrait",
  reverse_portrait: "reverse_landscape",
  reverse_landscape: "portrait",
};

export interface RotationActionOptions {
  readonly minIntervalMs: number;
  readonly stepDelayMs: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Turns the emulator one step along portrait → landscape → reverse
 * landscape → portrait per run. The console only knows `portrait` and
 * `landscape`, and each `landscape` command is a quarter turn, so reverse
 * landscape takes two of them. The orientation is tracked per command: a
 * run interrupted between the two leaves it at `reverse_portrait`, and the
 * next run finishes the turn with a single command.
 */
export class RotationAction implements PerturbationAction {
  readonly name = "rotation";
  readonly triggers: ReadonlySet<EventKind> = new Set(ROTATION_TRIGGERS);
  readonly minIntervalMs: number;
  private readonly device: DeviceActions;
  private readonly stepDelayMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private _orientation: RotationStep = "portrait";

  constructor(device: DeviceActions, options: RotationActionOptions) {
    this.device = device;
    this.minIntervalMs = options.minIntervalMs;
    this.stepDelayMs = options.stepDelayMs;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? silentLogger;
  }

  get orientation(): RotationStep {
    return this._orientation;
  }

  async run({ signal }: ActionContext): Promise<void> {
    const next = NEXT_STEP[this._orientation];
    if (next === "portrait") {
      await this.device.rotate("portrait", signal);
      this._orientation = "portrait";
    } else {
      let turns = 0;
      while (this._orientation !== next) {
        if (turns > 0) await sleep(this.stepDelayMs, this.clock, signal);
        await this.device.rotate("landscape", signal);
        this._orientation = QUARTER_TURN[this._orientation];
        turns++;
      }
    }
    this.logger.info(`rotated to ${next}`);
  }

  /**
   * Put the device back in portrait.
   *
   * @throws {DeviceCommandError} when the console command fails
   */
  async reset(signal?: AbortSignal): Promise<void> {
    await this.device.rotate("portrait", signal);
    this._orientation = "portrait";
  }
}
