import type { AppInfo, Clock, DeviceTransport, Logger, LogLevel } from "@droidprobe/core";
import type { CaptureStrategy } from "@droidprobe/device";
import type { HomeProbeConfig, PowerCycleConfig, RotationConfig, TaskStats } from "@droidprobe/perturbation";
import type { DriverExit, DriverLauncher } from "./driver.js";

export interface DriverConfig {
  readonly command?: string;
  readonly keepEnv?: boolean;
  readonly grantPermissions?: boolean;
  readonly extraArgs?: readonly string[];
  /** Wait between SIGTERM and SIGKILL when stopping the driver. */
  readonly graceMs?: number;
}

export interface CaptureConfig {
  readonly retries?: number;
  readonly backoffMs?: number;
  readonly strategyTimeoutMs?: number;
  readonly captureViewTree?: boolean;
}

export interface SessionMonitorConfig {
  readonly enabled?: boolean;
  readonly intervalMs?: number;
  readonly pixelThreshold?: number;
  readonly areaFractionThreshold?: number;
  readonly rotationThreshold?: number;
}

export interface AnalysisConfig {
  readonly crashSimilarityThreshold?: number;
  readonly homeProbeThreshold?: number;
}

export interface SessionConfig {
  readonly apk: string;
  /** Defaults to `output/<apk file name without extension>`. */
  readonly outputDir?: string;
  readonly serial?: string;
  readonly adbPath?: string;
  readonly commandTimeoutMs?: number;
  readonly timeoutMs?: number;
  /** How long to wait for the driver's `events/` directory to appear. */
  readonly startupTimeoutMs?: number;
  readonly pollIntervalMs?: number;
  /** Relative paths resolve against the output directory. `app.json` with `package`, `main_activity` and optionally `activities`. */
  readonly appInfoPath?: string;
  readonly app?: AppInfo;
  readonly logLevel?: LogLevel;
  readonly driver?: DriverConfig;
  readonly capture?: CaptureConfig;
  readonly monitor?: SessionMonitorConfig;
  readonly rotation?: RotationConfig;
  readonly powerCycle?: PowerCycleConfig;
  readonly homeProbe?: HomeProbeConfig;
  readonly analysis?: AnalysisConfig;
}

export interface ResolvedSessionConfig {
  readonly apk: string;
  readonly outputDir: string;
  readonly serial: string | null;
  readonly adbPath: string;
  readonly commandTimeoutMs: number;
  readonly timeoutMs: number;
  readonly startupTimeoutMs: number;
  readonly pollIntervalMs: number;
  readonly appInfoPath: string;
  readonly app: AppInfo | null;
  readonly logLevel: LogLevel;
  readonly driver: Required<DriverConfig>;
  readonly capture: Required<CaptureConfig>;
  readonly monitor: Required<SessionMonitorConfig>;
  readonly rotation: Required<RotationConfig>;
  readonly powerCycle: Required<PowerCycleConfig>;
  readonly homeProbe: Required<HomeProbeConfig>;
  readonly analysis: Required<AnalysisConfig>;
}

export type SessionEndReason = "timeout" | "driver_exit" | "aborted" | "fatal";

export interface SessionStatistics {
  readonly checksPerformed: number;
  readonly incidents: number;
  readonly crashes: number;
  readonly crashRate: number;
  readonly incidentRate: number;
}

export interface ActivityCoverage {
  readonly declared: number;
  readonly visited: readonly string[];
  /** Visited share of the declared activities; null when none are declared. */
  readonly ratio: number | null;
}

export interface SessionReport {
  readonly metadata: {
    readonly apk: string;
    readonly outputDirectory: string;
    readonly deviceSerial: string | null;
    readonly monitorIntervalMs: number;
    readonly startedAt: string;
    readonly endedAt: string;
    readonly durationMs: number;
    readonly endReason: SessionEndReason;
  };
  /** Package and main activity are null when the app identity was never learned. */
  readonly app: {
    readonly packageName: string | null;
    readonly mainActivity: string | null;
    readonly coverage: ActivityCoverage;
  };
  readonly statistics: SessionStatistics;
  readonly homeProbes: {
    readonly analyzed: number;
    readonly potentialDataLoss: number;
  };
  readonly driver: DriverExit | null;
  readonly perturbations: Readonly<Record<string, TaskStats>>;
}

export interface SessionDependencies {
  readonly launcher?: DriverLauncher;
  readonly transport?: DeviceTransport;
  /** Overrides the default capture strategies. */
  readonly strategies?: readonly CaptureStrategy[];
  readonly clock?: Clock;
  readonly logger?: Logger;
  /** External abort, e.g. SIGINT in the CLI. */
  readonly signal?: AbortSignal;
}
