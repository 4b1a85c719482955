/**
 * PerturbationCoordinator: routes driver events to the perturbation
 * tasks and keeps the home probe from overlapping the others.
 *
 * Rotation and power cycling run in the background. The home probe runs
 * inline: rotation and power are paused (their commands killed) for its
 * duration, along with any `observers`, and resumed afterwards whether or
 * not the probe succeeded.
 */

import {
  type Clock,
  defaultClock,
  type DeviceTransport,
  type EventRecord,
  type Logger,
  silentLogger,
} from "@droidprobe/core";
import { DeviceActions } from "@droidprobe/device";
import { getErrorMessage } from "@droidprobe/errors";
import { resolvePerturbationConfig } from "./config.js";
import { HomeProbeAction, type ProbeCamera } from "./home-probe.js";
import { PowerCycleAction } from "./power-cycle.js";
import { RotationAction } from "./rotation.js";
import { PerturbationTask } from "./task.js";
import type {
  HomeReturnSink,
  OfferOutcome,
  Pausable,
  PerturbationConfig,
  ResolvedPerturbationConfig,
  TaskStats,
} from "./types.js";

export interface CoordinatorDependencies {
  readonly transport: DeviceTransport;
  readonly camera: ProbeCamera;
  readonly commandTimeoutMs?: number;
  /** Held while HOME is pressed and the app relaunched, e.g. the data-loss monitor. */
  readonly observers?: readonly Pausable[];
  readonly homeSink?: HomeReturnSink;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export interface HandleEventResult {
  /** Outcome of the home probe, null when the event did not start one. */
  readonly homeProbe: OfferOutcome | null;
  /** Background tasks that accepted the event. */
  readonly started: readonly string[];
}

export class PerturbationCoordinator {
  readonly config: ResolvedPerturbationConfig;
  readonly rotation: PerturbationTask | null;
  readonly powerCycle: PerturbationTask | null;
  readonly homeProbe: PerturbationTask | null;
  private readonly _rotationAction: RotationAction | null;
  private readonly _observers: readonly Pausable[];
  private readonly _logger: Logger;
  private _shutDown = false;

  constructor(config: PerturbationConfig, deps: CoordinatorDependencies) {
    this.config = resolvePerturbationConfig(config);
    const clock = deps.clock ?? defaultClock;
    this._logger = deps.logger ?? silentLogger;
    this._observers = deps.observers ?? [];
    const device = new DeviceActions(deps.transport, {
      logger: this._logger,
      ...(deps.commandTimeoutMs !== undefined ? { commandTimeoutMs: deps.commandTimeoutMs } : {}),
    });
    const taskOptions = { clock, logger: this._logger };

    const { app, rotation, powerCycle, homeProbe } = this.config;

    this._rotationAction = rotation.enabled
      ? new RotationAction(device, {
          minIntervalMs: rotation.minIntervalMs,
          stepDelayMs: rotation.stepDelayMs,
          clock,
          logger: this._logger.child("rotation"),
        })
      : null;
    this.rotation = this._rotationAction ? new PerturbationTask(this._rotationAction, taskOptions) : null;

    this.powerCycle = powerCycle.enabled
      ? new PerturbationTask(
          new PowerCycleAction(device, {
            minIntervalMs: powerCycle.minIntervalMs,
            maxCycles: powerCycle.maxCycles,
            screenOffMs: powerCycle.screenOffMs,
            clock,
          }),
          taskOptions,
        )
      : null;

    this.homeProbe =
      homeProbe.enabled && app !== null
        ? new PerturbationTask(
            new HomeProbeAction(device, deps.camera, {
              app,
              outputDir: this.config.outputDir,
              minIntervalMs: homeProbe.minHomeIntervalMs,
              maxProbes: homeProbe.maxHomeProbes,
              returnDelayMs: homeProbe.returnDelayMs,
              settleMs: homeProbe.settleMs,
              ...(deps.homeSink !== undefined ? { sink: deps.homeSink } : {}),
              clock,
              logger: this._logger.child("home-probe"),
            }),
            taskOptions,
          )
        : null;
  }

  /**
   * Dispatch one driver event. Resolves after the home probe, if one ran;
   * rotation and power cycling continue in the background.
   */
  async handleEvent(event: EventRecord): Promise<HandleEventResult> {
    if (this._shutDown) return { homeProbe: null, started: [] };

    let probe: OfferOutcome | null = null;
    if (this.homeProbe !== null && this.homeProbe.check(event) === null) {
      probe = await this._probeExclusively(this.homeProbe, event);
    }

    const started: string[] = [];
    for (const task of this._backgroundTasks()) {
      if (task.check(event) === null) {
        started.push(task.name);
        void task.offer(event);
      }
    }
    return { homeProbe: probe, started };
  }

  /** Resolves once no task has a run in flight. */
  async idle(): Promise<void> {
    await Promise.all(this._allTasks().map((task) => task.settled()));
  }

  stats(): Readonly<Record<string, TaskStats>> {
    return Object.fromEntries(this._allTasks().map((task) => [task.name, task.stats()]));
  }

  /**
   * Stop every task and turn the device back to portrait.
   */
  async shutdown(): Promise<void> {
    if (this._shutDown) return;
    this._shutDown = true;
    await Promise.all(this._allTasks().map((task) => task.stop()));

    if (this._rotationAction !== null) {
      try {
        await this._rotationAction.reset();
      } catch (error) {
        this._logger.warn(`could not reset orientation to portrait: ${getErrorMessage(error)}`);
      }
    }
  }

  private async _probeExclusively(probe: PerturbationTask, event: EventRecord): Promise<OfferOutcome> {
    const paused = this._backgroundTasks().filter((task) => task.state === "running");
    await Promise.all([
      ...paused.map((task) => task.pause()),
      ...this._observers.map((observer) => observer.pause()),
    ]);
    try {
      return await probe.offer(event);
    } finally {
      for (const task of paused) task.resume();
      for (const observer of this._observers) observer.resume();
    }
  }

  private _backgroundTasks(): PerturbationTask[] {
    return [this.rotation, this.powerCycle].filter((task): task is PerturbationTask => task !== null);
  }

  private _allTasks(): PerturbationTask[] {
    return [...this._backgroundTasks(), this.homeProbe].filter(
      (task): task is PerturbationTask => task !== null,
    );
  }
}
