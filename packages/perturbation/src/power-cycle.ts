import { type Clock, defaultClock, type EventKind, sleep } from "@droidprobe/core";
import type { DeviceActions } from "@droidprobe/device";
import { KEYCODE_POWER, POWER_CYCLE_TRIGGERS } from "./constants.js";
import type { ActionContext, PerturbationAction } from "./types.js";

export interface PowerCycleActionOptions {
  readonly minIntervalMs: number;
  readonly maxCycles: number;
  readonly screenOffMs: number;
  readonly clock?: Clock;
}

/**
 * Screen off, wait, screen on, swipe the lock screen away.
 */
export class PowerCycleAction implements PerturbationAction {
  readonly name = "power_cycle";
  readonly triggers: ReadonlySet<EventKind> = new Set(POWER_CYCLE_TRIGGERS);
  readonly minIntervalMs: number;
  readonly maxAttempts: number;
  private readonly device: DeviceActions;
  private readonly screenOffMs: number;
  private readonly clock: Clock;

  constructor(device: DeviceActions, options: PowerCycleActionOptions) {
    this.device = device;
    this.minIntervalMs = options.minIntervalMs;
    this.maxAttempts = options.maxCycles;
    this.screenOffMs = options.screenOffMs;
    this.clock = options.clock ?? defaultClock;
  }

  async run({ signal }: ActionContext): Promise<void> {
    await this.device.pressKey(KEYCODE_POWER, signal);
    await sleep(this.screenOffMs, this.clock, signal);
    await this.device.pressKey(KEYCODE_POWER, signal);
    await this.device.unlockSwipe(signal);
  }
}
