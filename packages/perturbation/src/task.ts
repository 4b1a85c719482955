/**
 * PerturbationTask: a pausable handle around one {@link PerturbationAction}.
 *
 * The task owns an AbortController for its in-flight run. `pause()` and
 * `stop()` abort it, which kills the device command underneath, and wait
 * for the run to unwind. An attempt counts toward the cap and the rate
 * limit even when it fails.
 */

import {
  type Clock,
  defaultClock,
  type EventRecord,
  type Logger,
  silentLogger,
} from "@droidprobe/core";
import { getErrorMessage, toError } from "@droidprobe/errors";
import { getPerturbationCounter, withSpan } from "@droidprobe/telemetry";
import type {
  OfferOutcome,
  PerturbationAction,
  SkipReason,
  TaskState,
  TaskStats,
} from "./types.js";

export interface PerturbationTaskOptions {
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export class PerturbationTask {
  readonly name: string;
  private readonly _action: PerturbationAction;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private _state: TaskState = "running";
  private _controller = new AbortController();
  private _inFlight: Promise<OfferOutcome> | undefined;
  private _attempts = 0;
  private _succeeded = 0;
  private _failed = 0;
  private _lastStartedAt: number | null = null;

  constructor(action: PerturbationAction, options: PerturbationTaskOptions = {}) {
    this.name = action.name;
    this._action = action;
    this._clock = options.clock ?? defaultClock;
    this._logger = options.logger ?? silentLogger;
  }

  get state(): TaskState {
    return this._state;
  }

  get busy(): boolean {
    return this._inFlight !== undefined;
  }

  stats(): TaskStats {
    return {
      state: this._state,
      attempts: this._attempts,
      succeeded: this._succeeded,
      failed: this._failed,
    };
  }

  /**
   * Why `event` would be turned down right now, or null if it would run.
   */
  check(event: EventRecord): SkipReason | null {
    if (this._state !== "running") return "not_running";
    if (this._inFlight !== undefined) return "busy";
    if (!this._action.triggers.has(event.kind)) return "not_a_trigger";
    if (this._action.maxAttempts !== undefined && this._attempts >= this._action.maxAttempts) {
      return "cap_reached";
    }
    if (
      this._lastStartedAt !== null &&
      this._clock.now() - this._lastStartedAt < this._action.minIntervalMs
    ) {
      return "too_soon";
    }
    return null;
  }

  /**
   * Run the action for `event` if the task accepts it. Resolves when the run
   * finishes; never rejects.
   */
  offer(event: EventRecord): Promise<OfferOutcome> {
    const reason = this.check(event);
    if (reason !== null) {
      return Promise.resolve({ status: "skipped", reason });
    }

    this._attempts++;
    this._lastStartedAt = this._clock.now();
    const run = this._execute(event, this._attempts, this._controller.signal).finally(() => {
      this._inFlight = undefined;
    });
    this._inFlight = run;
    return run;
  }

  /**
   * Abort the in-flight run and hold further offers until {@link resume}.
   */
  async pause(): Promise<void> {
    if (this._state !== "running") return;
    this._state = "paused";
    this._controller.abort();
    await this.settled();
  }

  resume(): void {
    if (this._state !== "paused") return;
    this._controller = new AbortController();
    this._state = "running";
  }

  async stop(): Promise<void> {
    if (this._state === "stopped") return;
    this._state = "stopped";
    this._controller.abort();
    await this.settled();
  }

  /** Resolves once no run is in flight. */
  async settled(): Promise<void> {
    if (this._inFlight !== undefined) {
      await this._inFlight;
    }
  }

  private async _execute(event: EventRecord, attempt: number, signal: AbortSignal): Promise<OfferOutcome> {
    this._logger.info(`${this.name} #${attempt} triggered by ${event.id}`);
    try {
      await withSpan(
        `droidprobe.perturbation.${this.name}`,
        { "perturbation.attempt": attempt, "perturbation.trigger": event.kind },
        () => this._action.run({ signal, attempt, event }),
      );
      this._succeeded++;
      getPerturbationCounter().add(1, { task: this.name, outcome: "success" });
      return { status: "ran" };
    } catch (error) {
      if (signal.aborted) {
        this._logger.info(`${this.name} #${attempt} interrupted`);
        getPerturbationCounter().add(1, { task: this.name, outcome: "aborted" });
        return { status: "aborted" };
      }
      this._failed++;
      this._logger.warn(`${this.name} #${attempt} failed: ${getErrorMessage(error)}`);
      getPerturbationCounter().add(1, { task: this.name, outcome: "failure" });
      return { status: "failed", error: toError(error) };
    }
  }
}
