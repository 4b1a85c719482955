/**
 * SnapshotSampler: captures the device screen with strategy fallback and
 * retry, persists the PNG and annotates it with the foreground activity.
 *
 * Failures are returned, not thrown: a capture that exhausts every
 * strategy on every attempt yields `{ ok: false, failure }`.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import {
  type Clock,
  compactTimestamp,
  defaultClock,
  type DeviceTransport,
  isAbortError,
  type Logger,
  padSequence,
  silentLogger,
  sleep,
} from "@droidprobe/core";
import { CaptureFailedError, getErrorMessage, ValidationError } from "@droidprobe/errors";
import { getSnapshotCounter } from "@droidprobe/telemetry";
import { DeviceActions } from "./actions.js";
import {
  DEFAULT_CAPTURE_BACKOFF_MS,
  DEFAULT_CAPTURE_RETRIES,
  DEFAULT_STRATEGY_TIMEOUT_MS,
  SNAPSHOT_DIRECTORY,
} from "./constants.js";
import { Snapshot } from "./snapshot.js";
import { type CaptureStrategy, DEFAULT_STRATEGIES, type StrategyOutcome } from "./strategies.js";

export interface SnapshotSamplerConfig {
  readonly transport: DeviceTransport;
  /** Session output directory. Snapshots go to `<outputDir>/monitor_states`. */
  readonly outputDir: string;
  /** Overrides the snapshot directory. */
  readonly snapshotDir?: string;
  readonly strategies?: readonly CaptureStrategy[];
  readonly strategyTimeoutMs?: number;
  /** Passes over the strategy list before giving up. */
  readonly retries?: number;
  readonly backoffMs?: number;
  readonly captureViewTree?: boolean;
  readonly scratchDir?: string;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export type CaptureResult =
  | { readonly ok: true; readonly snapshot: Snapshot }
  | { readonly ok: false; readonly failure: CaptureFailedError };

type Acquired =
  | { readonly ok: true; readonly bytes: Buffer }
  | { readonly ok: false; readonly failure: CaptureFailedError };

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`);
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative number, got ${value}`);
  }
}

export class SnapshotSampler {
  readonly snapshotDir: string;
  private readonly transport: DeviceTransport;
  private readonly actions: DeviceActions;
  private readonly strategies: readonly CaptureStrategy[];
  private readonly strategyTimeoutMs: number;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly captureViewTree: boolean;
  private readonly scratchDir: string;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private sequence = 0;

  constructor(config: SnapshotSamplerConfig) {
    this.transport = config.transport;
    this.logger = config.logger ?? silentLogger;
    this.actions = new DeviceActions(config.transport, { logger: this.logger });
    this.snapshotDir = config.snapshotDir ?? join(config.outputDir, SNAPSHOT_DIRECTORY);
    this.strategies = config.strategies ?? DEFAULT_STRATEGIES;
    this.strategyTimeoutMs = config.strategyTimeoutMs ?? DEFAULT_STRATEGY_TIMEOUT_MS;
    this.retries = config.retries ?? DEFAULT_CAPTURE_RETRIES;
    this.backoffMs = config.backoffMs ?? DEFAULT_CAPTURE_BACKOFF_MS;
    this.captureViewTree = config.captureViewTree ?? false;
    this.scratchDir = config.scratchDir ?? tmpdir();
    this.clock = config.clock ?? defaultClock;

    if (this.strategies.length === 0) {
      throw new ValidationError("at least one capture strategy is required");
    }
    requirePositiveInteger("retries", this.retries);
    requireNonNegative("backoffMs", this.backoffMs);
    requireNonNegative("strategyTimeoutMs", this.strategyTimeoutMs);
  }

  /** Snapshots written so far. */
  get captured(): number {
    return this.sequence;
  }

  /**
   * Capture into the snapshot directory under a unique, time-ordered name.
   */
  async capture(signal?: AbortSignal): Promise<CaptureResult> {
    const acquired = await this.acquire(signal);
    if (!acquired.ok) return acquired;

    const capturedAt = this.clock.now();
    this.sequence++;
    const name = `snapshot_${compactTimestamp(capturedAt)}_${padSequence(this.sequence, 6)}.png`;
    return this.persist(join(this.snapshotDir, name), acquired.bytes, capturedAt, signal);
  }

  /**
   * Capture to an explicit path, e.g. the before/after images of a home probe.
   */
  async captureToFile(path: string, signal?: AbortSignal): Promise<CaptureResult> {
    const acquired = await this.acquire(signal);
    if (!acquired.ok) return acquired;
    return this.persist(path, acquired.bytes, this.clock.now(), signal);
  }

  private async persist(
    path: string,
    bytes: Buffer,
    capturedAt: number,
    signal: AbortSignal | undefined,
  ): Promise<CaptureResult> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes);

    const activity = await this.actions.foregroundActivity(signal);
    const viewTree = this.captureViewTree ? await this.actions.dumpViewTree(signal) : null;

    return {
      ok: true,
      snapshot: new Snapshot({
        capturedAt,
        wallClock: new Date(capturedAt).toISOString(),
        imagePath: path,
        activity,
        viewTree,
      }),
    };
  }

  private async acquire(signal: AbortSignal | undefined): Promise<Acquired> {
    const errors: string[] = [];
    let attempts = 0;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      attempts = attempt;
      for (const strategy of this.strategies) {
        if (signal?.aborted) return this.fail(attempts, [...errors, "aborted"]);

        let outcome: StrategyOutcome;
        try {
          outcome = await strategy.capture({
            transport: this.transport,
            timeoutMs: this.strategyTimeoutMs,
            signal,
            scratchDir: this.scratchDir,
          });
        } catch (error) {
          outcome = { ok: false, error: getErrorMessage(error) };
        }

        if (outcome.ok) {
          getSnapshotCounter().add(1, { outcome: "success", strategy: strategy.name });
          return outcome;
        }
        errors.push(`${strategy.name}: ${outcome.error}`);
        this.logger.debug(`capture attempt ${attempt} via ${strategy.name} failed: ${outcome.error}`);
      }

      if (attempt < this.retries) {
        try {
          await sleep(this.backoffMs, this.clock, signal);
        } catch (error) {
          if (isAbortError(error)) return this.fail(attempts, [...errors, "aborted"]);
          throw error;
        }
      }
    }

    return this.fail(attempts, errors);
  }

  private fail(attempts: number, errors: readonly string[]): Acquired {
    getSnapshotCounter().add(1, { outcome: "failure" });
    const failure = new CaptureFailedError(attempts, errors);
    this.logger.warn(failure.message);
    return { ok: false, failure };
  }
}
