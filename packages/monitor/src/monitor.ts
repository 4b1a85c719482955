/**
 * DataLossMonitor: samples the screen on a fixed interval and turns
 * suspicious transitions between consecutive snapshots into incidents.
 *
 * Uses recursive setTimeout with drift compensation through the injected
 * clock. A tick never throws: failures are logged, recorded as
 * `lastError`, and monitoring continues.
 *
 * Each tick owns an AbortController; `stop()` and `pause()` abort the
 * capture in flight instead of waiting out the sampler's retries.
 */

import {
  type Clock,
  defaultClock,
  type EventRecord,
  type Logger,
  RingBuffer,
  silentLogger,
} from "@droidprobe/core";
import { componentPackage, type Snapshot } from "@droidprobe/device";
import { getErrorMessage } from "@droidprobe/errors";
import { getIncidentCounter, withSpan } from "@droidprobe/telemetry";
import { compareImages, detectRotation, hashDistance } from "@droidprobe/vision";
import { resolveMonitorConfig } from "./config.js";
import { buildDataLossReport, type DataLossReport, IncidentStore } from "./incident-store.js";
import type {
  EventSource,
  HomeReturnPair,
  Incident,
  IncidentReason,
  MonitorConfig,
  MonitorCounters,
  MonitorDependencies,
  MonitorPhase,
  MonitorStatus,
  ResolvedMonitorConfig,
  SnapshotSource,
  TickOutcome,
} from "./types.js";

type MutableCounters = {
  -readonly [K in keyof MonitorCounters]: MonitorCounters[K];
};

export class DataLossMonitor {
  readonly config: ResolvedMonitorConfig;
  readonly store: IncidentStore;

  private readonly _sampler: SnapshotSource;
  private readonly _events: EventSource;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _eventHistory: RingBuffer<EventRecord>;
  private readonly _snapshots: RingBuffer<Snapshot>;
  private readonly _counters: MutableCounters = {
    checksPerformed: 0,
    incidents: 0,
    leftForeground: 0,
    visualChanges: 0,
    rotationsIgnored: 0,
    captureFailures: 0,
  };
  private _running = false;
  private _held = false;
  private _phase: MonitorPhase = "idle";
  private _tickNumber = 0;
  private _lastError: string | null = null;
  private _timerId: ReturnType<Clock["setTimeout"]> | undefined;
  private _inFlight: Promise<TickOutcome> | undefined;
  private _tickAbort: AbortController | undefined;

  constructor(config: MonitorConfig, deps: MonitorDependencies) {
    this.config = resolveMonitorConfig(config);
    this._sampler = deps.sampler;
    this._events = deps.events;
    this._clock = deps.clock ?? defaultClock;
    this._logger = deps.logger ?? silentLogger;
    this._eventHistory = new RingBuffer<EventRecord>(this.config.eventHistorySize);
    this._snapshots = new RingBuffer<Snapshot>(this.config.snapshotHistorySize);
    this.store = new IncidentStore(this.config.outputDir, { clock: this._clock, logger: this._logger });
  }

  /**
   * Start the sampling timer. Idempotent.
   */
  start(): void {
    if (this._running) return;
    this._running = true;
    const { targetPackage, intervalMs } = this.config;
    if (targetPackage === null) {
      this._logger.warn(`monitoring every ${intervalMs}ms without foreground checks: app identity unknown`);
    } else {
      this._logger.info(`monitoring ${targetPackage} every ${intervalMs}ms`);
    }
    this._scheduleNextTick(this.config.intervalMs);
  }

  /**
   * Stop the timer, abort and wait for an in-progress tick, then write
   * `data_loss_report.json`. Returns null when the monitor was not running.
   */
  async stop(): Promise<DataLossReport | null> {
    if (!this._running) return null;
    this._running = false;

    if (this._timerId !== undefined) {
      this._clock.clearTimeout(this._timerId);
      this._timerId = undefined;
    }

    this._tickAbort?.abort();
    if (this._inFlight !== undefined) {
      await this._inFlight;
    }

    this._phase = "reporting";
    try {
      return await buildDataLossReport(this.config.outputDir, {
        counters: this.counters(),
        clock: this._clock,
        logger: this._logger,
      });
    } finally {
      this._phase = "idle";
    }
  }

  /**
   * Hold sampling while something else drives the device. The capture in
   * flight is aborted and awaited; scheduled ticks are skipped until
   * {@link resume}.
   */
  async pause(): Promise<void> {
    this._held = true;
    this._tickAbort?.abort();
    if (this._inFlight !== undefined) {
      await this._inFlight;
    }
  }

  resume(): void {
    this._held = false;
  }

  get held(): boolean {
    return this._held;
  }

  /**
   * Compare the screenshots taken around a HOME press and relaunch. A
   * fingerprint distance above `homeThreshold` is persisted as a
   * `home_probe` incident. Returns null when the screens match.
   */
  async recordHomeReturn(pair: HomeReturnPair): Promise<Incident | null> {
    const [beforeHash, afterHash] = await Promise.all([pair.before.fingerprint(), pair.after.fingerprint()]);
    const distance = hashDistance(beforeHash, afterHash);
    if (distance <= this.config.homeThreshold) {
      this._logger.debug(`home return #${pair.attempt} restored the screen (distance ${distance})`);
      return null;
    }

    this._counters.incidents++;
    getIncidentCounter().add(1, { reason: "home_probe" });
    const recentEvents = this._eventHistory.toArray();
    return this.store.persist({
      reason: "home_probe",
      triggeringEventKind: recentEvents[recentEvents.length - 1]?.kind ?? null,
      changeRatio: null,
      hashDistance: distance,
      snapshots: [pair.before, pair.after],
      recentEvents,
      counters: this.counters(),
    });
  }

  status(): MonitorStatus {
    return {
      running: this._running,
      phase: this._phase,
      tickNumber: this._tickNumber,
      checksPerformed: this._counters.checksPerformed,
      incidents: this._counters.incidents,
      lastError: this._lastError,
    };
  }

  counters(): MonitorCounters {
    return { ...this._counters };
  }

  /** Snapshot history, oldest first. */
  snapshots(): readonly Snapshot[] {
    return this._snapshots.toArray();
  }

  /** Most recent driver events seen by this monitor, oldest first. */
  recentEvents(): readonly EventRecord[] {
    return this._eventHistory.toArray();
  }

  /**
   * Run one sampling cycle now. Concurrent calls share the in-flight tick.
   */
  tick(): Promise<TickOutcome> {
    if (this._held) return Promise.resolve({ kind: "held" });
    if (this._inFlight !== undefined) return this._inFlight;
    const run = this._executeTick().finally(() => {
      this._inFlight = undefined;
    });
    this._inFlight = run;
    return run;
  }

  // ---------------------------------------------------------------------------
  // Timer management
  // ---------------------------------------------------------------------------

  private _scheduleNextTick(delayMs: number): void {
    if (!this._running) return;
    this._timerId = this._clock.setTimeout(() => {
      void this._scheduledTick();
    }, delayMs);
  }

  private async _scheduledTick(): Promise<void> {
    this._timerId = undefined;
    if (!this._running) return;
    if (this._held) {
      this._scheduleNextTick(this.config.intervalMs);
      return;
    }

    const tickStart = this._clock.now();
    await this.tick();

    const elapsed = this._clock.now() - tickStart;
    this._scheduleNextTick(Math.max(0, this.config.intervalMs - elapsed));
  }

  // ---------------------------------------------------------------------------
  // Tick
  // ---------------------------------------------------------------------------

  private async _executeTick(): Promise<TickOutcome> {
    this._tickNumber++;
    const tickNumber = this._tickNumber;
    const abort = new AbortController();
    this._tickAbort = abort;

    try {
      return await withSpan("droidprobe.monitor.tick", { "monitor.tick": tickNumber }, () =>
        this._sampleAndCompare(abort.signal),
      );
    } catch (error) {
      const message = getErrorMessage(error);
      this._lastError = message;
      this._logger.error(`tick ${tickNumber} failed: ${message}`);
      return { kind: "error", error: message };
    } finally {
      this._tickAbort = undefined;
      this._phase = "idle";
    }
  }

  private async _sampleAndCompare(signal: AbortSignal): Promise<TickOutcome> {
    this._phase = "sampling";
    for (const event of await this._events.poll()) {
      this._eventHistory.push(event);
    }

    const result = await this._sampler.capture(signal);
    if (signal.aborted) {
      return { kind: "aborted" };
    }
    if (!result.ok) {
      this._counters.captureFailures++;
      this._lastError = result.failure.message;
      return { kind: "capture_failed", error: result.failure.message };
    }
    this._snapshots.push(result.snapshot);

    const [previous, current] = this._snapshots.latest(2);
    if (previous === undefined || current === undefined) {
      return { kind: "insufficient_history" };
    }

    this._phase = "comparing";
    this._counters.checksPerformed++;

    const [before, after, beforeHash, afterHash] = await Promise.all([
      previous.image(),
      current.image(),
      previous.fingerprint(),
      current.fingerprint(),
    ]);
    const distance = hashDistance(beforeHash, afterHash);

    const { targetPackage } = this.config;
    if (
      targetPackage !== null &&
      current.activity !== null &&
      componentPackage(current.activity) !== targetPackage
    ) {
      this._counters.leftForeground++;
      return this._report("left_foreground", null, distance);
    }

    const rotation = detectRotation(before, after, {
      pixelThreshold: this.config.pixelThreshold,
      rotationThreshold: this.config.rotationThreshold,
    });
    if (rotation !== null) {
      this._counters.rotationsIgnored++;
      this._logger.debug(`rotation by ${rotation} degrees, not data loss`);
      return { kind: "rotation", rotation };
    }

    const comparison = compareImages(before, after, {
      pixelThreshold: this.config.pixelThreshold,
      areaFractionThreshold: this.config.areaFractionThreshold,
    });
    if (!comparison.changed) {
      return { kind: "unchanged", changeRatio: comparison.changeRatio };
    }

    this._counters.visualChanges++;
    return this._report("visual_change", comparison.changeRatio, distance);
  }

  private async _report(
    reason: IncidentReason,
    changeRatio: number | null,
    distance: number,
  ): Promise<TickOutcome> {
    this._phase = "reporting";
    this._counters.incidents++;
    getIncidentCounter().add(1, { reason });

    const recentEvents = this._eventHistory.toArray();
    const incident = await this.store.persist({
      reason,
      triggeringEventKind: recentEvents[recentEvents.length - 1]?.kind ?? null,
      changeRatio,
      hashDistance: distance,
      snapshots: this._snapshots.toArray(),
      recentEvents,
      counters: this.counters(),
    });
    return { kind: "incident", incident };
  }
}

export function createDataLossMonitor(config: MonitorConfig, deps: MonitorDependencies): DataLossMonitor {
  return new DataLossMonitor(config, deps);
}
