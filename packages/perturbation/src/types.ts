import type { AppInfo, EventKind, EventRecord } from "@droidprobe/core";
import type { Snapshot } from "@droidprobe/device";

export type TaskState = "running" | "paused" | "stopped";

export type SkipReason = "not_running" | "busy" | "not_a_trigger" | "cap_reached" | "too_soon";

export type OfferOutcome =
  | { readonly status: "ran" }
  | { readonly status: "skipped"; readonly reason: SkipReason }
  | { readonly status: "aborted" }
  | { readonly status: "failed"; readonly error: Error };

export interface ActionContext {
  /** Aborted when the owning task is paused or stopped. */
  readonly signal: AbortSignal;
  /** 1-based attempt number of this run. */
  readonly attempt: number;
  readonly event: EventRecord;
}

/**
 * What a {@link PerturbationTask} runs, and when it may run it.
 */
export interface PerturbationAction {
  readonly name: string;
  readonly triggers: ReadonlySet<EventKind>;
  readonly minIntervalMs: number;
  /** Total attempts allowed; unlimited when absent. */
  readonly maxAttempts?: number | undefined;
  run(context: ActionContext): Promise<void>;
}

export interface TaskStats {
  readonly state: TaskState;
  readonly attempts: number;
  readonly succeeded: number;
  readonly failed: number;
}

export interface RotationConfig {
  readonly enabled?: boolean;
  readonly minIntervalMs?: number;
  readonly stepDelayMs?: number;
}

export interface PowerCycleConfig {
  readonly enabled?: boolean;
  readonly minIntervalMs?: number;
  readonly maxCycles?: number;
  readonly screenOffMs?: number;
}

export interface HomeProbeConfig {
  readonly enabled?: boolean;
  readonly minHomeIntervalMs?: number;
  readonly maxHomeProbes?: number;
  readonly returnDelayMs?: number;
  readonly settleMs?: number;
}

/** Something that must not touch the device while the home button check runs. */
export interface Pausable {
  pause(): Promise<void>;
  resume(): void;
}

/** Screenshots taken before pressing HOME and after relaunching the app. */
export interface HomeReturn {
  readonly attempt: number;
  readonly before: Snapshot;
  readonly after: Snapshot;
}

/** Receives every completed before/after pair, normally the data-loss monitor. */
export interface HomeReturnSink {
  record(pair: HomeReturn): Promise<unknown>;
}

export interface PerturbationConfig {
  /** App under test; null when unknown, which requires `homeProbe.enabled: false`. */
  readonly app: AppInfo | null;
  /** Session output directory; probe screenshots go to `home_button_screenshots/` below it. */
  readonly outputDir: string;
  readonly rotation?: RotationConfig;
  readonly powerCycle?: PowerCycleConfig;
  readonly homeProbe?: HomeProbeConfig;
}

export interface ResolvedPerturbationConfig {
  readonly app: AppInfo | null;
  readonly outputDir: string;
  readonly rotation: Required<RotationConfig>;
  readonly powerCycle: Required<PowerCycleConfig>;
  readonly homeProbe: Required<HomeProbeConfig>;
}
