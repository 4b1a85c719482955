/**
 * SessionOrchestrator: one exploration session from driver launch to
 * final report.
 *
 * Lifecycle:
 * 1. Create the output directory (the only fatal step besides launching the driver)
 * 2. Launch the driver and wait for its `events/` directory
 * 3. Load the app identity, start the monitor and the perturbation coordinator.
 *    Without an app identity the foreground check and the home probe are off.
 * 4. Poll new driver events every `pollIntervalMs` and hand them to the coordinator
 * 5. On timeout, driver exit or external abort: stop tasks, stop the monitor,
 *    terminate the driver
 * 6. Run the offline analyses and write `session_report.json`
 *
 * Cleanup and the final report are attempted even after a fatal error,
 * which is then rethrown as {@link SessionFatalError}.
 */

import { mkdir } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import {
  analyzeCrashes,
  analyzeHomeProbeLoss,
  type CrashReport,
  type HomeProbeLossReport,
  saveCrashReport,
  saveHomeProbeLossReport,
} from "@droidprobe/analysis";
import {
  type AppInfo,
  type Clock,
  defaultClock,
  type DeviceTransport,
  isAbortError,
  type Logger,
  silentLogger,
  sleep,
} from "@droidprobe/core";
import { AdbTransport, SnapshotSampler } from "@droidprobe/device";
import { getErrorMessage, SessionFatalError, toError, ValidationError } from "@droidprobe/errors";
import { EventStreamReader } from "@droidprobe/events";
import {
  buildDataLossReport,
  createDataLossMonitor,
  type DataLossMonitor,
  type DataLossReport,
} from "@droidprobe/monitor";
import { type HomeReturn, PerturbationCoordinator } from "@droidprobe/perturbation";
import { describeApp, loadAppInfo } from "./app-info.js";
import { EVENTS_DIRECTORY, STATES_DIRECTORY } from "./constants.js";
import {
  buildDriverArgs,
  type DriverExit,
  type DriverLauncher,
  type DriverProcess,
  SpawnDriverLauncher,
} from "./driver.js";
import {
  activityCoverage,
  collectVisitedActivities,
  computeStatistics,
  saveSessionReport,
} from "./summary.js";
import type {
  ResolvedSessionConfig,
  SessionDependencies,
  SessionEndReason,
  SessionReport,
} from "./types.js";

export interface SessionResult {
  readonly report: SessionReport;
  readonly reportPath: string;
  readonly app: AppInfo | null;
  readonly crashReport: CrashReport;
  readonly homeProbeReport: HomeProbeLossReport;
  readonly dataLossReport: DataLossReport;
}

export class SessionOrchestrator {
  readonly config: ResolvedSessionConfig;
  readonly eventsDir: string;
  readonly statesDir: string;

  private readonly _launcher: DriverLauncher;
  private readonly _transport: DeviceTransport;
  private readonly _deps: SessionDependencies;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private _started = false;
  private _app: AppInfo | null;
  private _driver: DriverProcess | null = null;
  private _monitor: DataLossMonitor | null = null;
  private _coordinator: PerturbationCoordinator | null = null;

  constructor(config: ResolvedSessionConfig, deps: SessionDependencies = {}) {
    this.config = config;
    this._deps = deps;
    this._clock = deps.clock ?? defaultClock;
    this._logger = deps.logger ?? silentLogger;
    this._launcher = deps.launcher ?? new SpawnDriverLauncher(this._logger.child("driver"));
    this._transport =
      deps.transport ??
      new AdbTransport({
        adbPath: config.adbPath,
        serial: config.serial ?? undefined,
        logger: this._logger.child("adb"),
      });
    this._app = config.app;
    this.eventsDir = join(config.outputDir, EVENTS_DIRECTORY);
    this.statesDir = join(config.outputDir, STATES_DIRECTORY);
  }

  /**
   * Run the session to completion. A session runs once.
   *
   * @throws {SessionFatalError} when the session could not run; the report
   *   is still written if the output directory is usable
   */
  async run(): Promise<SessionResult> {
    if (this._started) {
      throw new ValidationError("a SessionOrchestrator runs a single session");
    }
    this._started = true;

    const startedAt = this._clock.now();
    let endReason: SessionEndReason;
    let fatal: Error | null = null;

    try {
      await this._prepare();
      this._driver = await this._launcher.launch({
        command: this.config.driver.command,
        args: buildDriverArgs(this.config),
      });
      endReason = await this._explore(this._driver, startedAt + this.config.timeoutMs);
    } catch (error) {
      fatal = toError(error);
      endReason = "fatal";
      this._logger.error(`session failed: ${fatal.message}`);
    }

    const { driverExit, dataLoss } = await this._cleanup();

    if (fatal !== null) {
      try {
        await this._finish(startedAt, endReason, driverExit, dataLoss);
      } catch (error) {
        this._logger.warn(`could not write the final report: ${getErrorMessage(error)}`);
      }
      throw fatal instanceof SessionFatalError ? fatal : new SessionFatalError(fatal.message, fatal);
    }
    return this._finish(startedAt, endReason, driverExit, dataLoss);
  }

  private async _prepare(): Promise<void> {
    try {
      await mkdir(this.config.outputDir, { recursive: true });
    } catch (error) {
      throw new SessionFatalError(
        `cannot create output directory ${this.config.outputDir}: ${getErrorMessage(error)}`,
        toError(error),
      );
    }
  }

  private async _explore(driver: DriverProcess, deadline: number): Promise<SessionEndReason> {
    const stop = new AbortController();
    const external = this._deps.signal;
    const onAbort = (): void => stop.abort();
    external?.addEventListener("abort", onAbort, { once: true });
    if (external?.aborted) stop.abort();
    void driver.exited.then(onAbort);

    try {
      const reader = new EventStreamReader({
        directory: this.eventsDir,
        clock: this._clock,
        logger: this._logger.child("events"),
      });

      const startupWait = Math.max(0, Math.min(this.config.startupTimeoutMs, deadline - this._clock.now()));
      const ready = await this._untilAborted(reader.waitForDirectory(startupWait, stop.signal), false);
      if (stop.signal.aborted) return this._endReason(driver, external);
      if (!ready) {
        this._logger.warn(`driver created no ${EVENTS_DIRECTORY}/ directory within ${startupWait}ms`);
      }

      await this._startComponents();

      while (!stop.signal.aborted && this._clock.now() < deadline) {
        for (const event of await reader.poll()) {
          if (stop.signal.aborted) break;
          await this._coordinator?.handleEvent(event);
        }

        const wait = Math.min(this.config.pollIntervalMs, deadline - this._clock.now());
        if (wait <= 0) break;
        await this._untilAborted(sleep(wait, this._clock, stop.signal), undefined);
      }
      return this._endReason(driver, external);
    } finally {
      external?.removeEventListener("abort", onAbort);
    }
  }

  /** Resolve `fallback` instead of rejecting when the wait was aborted. */
  private async _untilAborted<T>(wait: Promise<T>, fallback: T): Promise<T> {
    try {
      return await wait;
    } catch (error) {
      if (isAbortError(error)) return fallback;
      throw error;
    }
  }

  private _endReason(driver: DriverProcess, external: AbortSignal | undefined): SessionEndReason {
    if (external?.aborted) return "aborted";
    if (!driver.running) return "driver_exit";
    return "timeout";
  }

  private async _startComponents(): Promise<void> {
    const { config } = this;

    if (config.app === null) {
      const appInfoPath = isAbsolute(config.appInfoPath)
        ? config.appInfoPath
        : join(config.outputDir, config.appInfoPath);
      this._app = await loadAppInfo(appInfoPath, this._logger);
    }
    this._logger.info(`app under test: ${describeApp(this._app)}`);

    const sampler = new SnapshotSampler({
      transport: this._transport,
      outputDir: config.outputDir,
      retries: config.capture.retries,
      backoffMs: config.capture.backoffMs,
      strategyTimeoutMs: config.capture.strategyTimeoutMs,
      captureViewTree: config.capture.captureViewTree,
      clock: this._clock,
      logger: this._logger.child("sampler"),
      ...(this._deps.strategies !== undefined ? { strategies: this._deps.strategies } : {}),
    });

    const app = this._app;
    let homeProbe = config.homeProbe;
    if (app === null && homeProbe.enabled) {
      this._logger.warn("home button check disabled: app identity unknown");
      homeProbe = { ...homeProbe, enabled: false };
    }

    const monitor = config.monitor.enabled
      ? createDataLossMonitor(
          {
            targetPackage: app?.packageName ?? null,
            outputDir: config.outputDir,
            intervalMs: config.monitor.intervalMs,
            homeThreshold: config.analysis.homeProbeThreshold,
            pixelThreshold: config.monitor.pixelThreshold,
            areaFractionThreshold: config.monitor.areaFractionThreshold,
            rotationThreshold: config.monitor.rotationThreshold,
          },
          {
            sampler,
            // The monitor keeps its own view of the event stream.
            events: new EventStreamReader({ directory: this.eventsDir, clock: this._clock }),
            clock: this._clock,
            logger: this._logger.child("monitor"),
          },
        )
      : null;
    this._monitor = monitor;
    monitor?.start();

    this._coordinator = new PerturbationCoordinator(
      {
        app,
        outputDir: config.outputDir,
        rotation: config.rotation,
        powerCycle: config.powerCycle,
        homeProbe,
      },
      {
        transport: this._transport,
        camera: sampler,
        ...(monitor !== null
          ? { observers: [monitor], homeSink: { record: (pair: HomeReturn) => monitor.recordHomeReturn(pair) } }
          : {}),
        commandTimeoutMs: config.commandTimeoutMs,
        clock: this._clock,
        logger: this._logger.child("perturbation"),
      },
    );
  }

  private async _cleanup(): Promise<{ driverExit: DriverExit | null; dataLoss: DataLossReport | null }> {
    if (this._coordinator !== null) {
      try {
        await this._coordinator.shutdown();
      } catch (error) {
        this._logger.warn(`stopping perturbation tasks failed: ${getErrorMessage(error)}`);
      }
    }

    let dataLoss: DataLossReport | null = null;
    if (this._monitor !== null) {
      try {
        dataLoss = await this._monitor.stop();
      } catch (error) {
        this._logger.warn(`stopping the monitor failed: ${getErrorMessage(error)}`);
      }
    }

    let driverExit: DriverExit | null = null;
    if (this._driver !== null) {
      driverExit = this._driver.running
        ? await this._driver.terminate(this.config.driver.graceMs)
        : await this._driver.exited;
      this._logger.info(
        `driver exited (code ${driverExit.exitCode ?? "none"}, signal ${driverExit.signal ?? "none"})`,
      );
    }
    return { driverExit, dataLoss };
  }

  private async _finish(
    startedAt: number,
    endReason: SessionEndReason,
    driverExit: DriverExit | null,
    monitorReport: DataLossReport | null,
  ): Promise<SessionResult> {
    const { config } = this;
    const clock = this._clock;

    const crashReport = await analyzeCrashes(this.statesDir, this.eventsDir, {
      similarityThreshold: config.analysis.crashSimilarityThreshold,
      clock,
      logger: this._logger.child("crash"),
    });
    await saveCrashReport(crashReport, config.outputDir);

    const homeProbeReport = await analyzeHomeProbeLoss(config.outputDir, {
      similarityThreshold: config.analysis.homeProbeThreshold,
      clock,
      logger: this._logger.child("home-probe"),
    });
    await saveHomeProbeLossReport(homeProbeReport, config.outputDir);

    const dataLossReport =
      monitorReport ?? (await buildDataLossReport(config.outputDir, { clock, logger: this._logger }));

    const visited = await collectVisitedActivities(this.statesDir, this._logger);
    const endedAt = clock.now();

    const report: SessionReport = {
      metadata: {
        apk: config.apk,
        outputDirectory: config.outputDir,
        deviceSerial: config.serial,
        monitorIntervalMs: config.monitor.intervalMs,
        startedAt: new Date(startedAt).toISOString(),
        endedAt: new Date(endedAt).toISOString(),
        durationMs: endedAt - startedAt,
        endReason,
      },
      app: {
        packageName: this._app?.packageName ?? null,
        mainActivity: this._app?.mainActivity ?? null,
        coverage: activityCoverage(this._app?.activities ?? [], visited),
      },
      statistics: computeStatistics({
        counters: dataLossReport.counters,
        incidents: dataLossReport.incidents,
        crashes: crashReport,
      }),
      homeProbes: {
        analyzed: homeProbeReport.statistics.totalActionsAnalyzed,
        potentialDataLoss: homeProbeReport.statistics.potentialDataLoss,
      },
      driver: driverExit,
      perturbations: this._coordinator?.stats() ?? {},
    };

    const reportPath = await saveSessionReport(report, config.outputDir);
    this._logger.info(`session report written to ${reportPath}`);
    return { report, reportPath, app: this._app, crashReport, homeProbeReport, dataLossReport };
  }
}
