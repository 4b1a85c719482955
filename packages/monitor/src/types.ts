import type { Clock, EventKind, EventRecord, Logger } from "@droidprobe/core";
import type { CaptureResult, Snapshot } from "@droidprobe/device";
import type { Rotation } from "@droidprobe/vision";

export type MonitorPhase = "idle" | "sampling" | "comparing" | "reporting";

export type IncidentReason = "left_foreground" | "visual_change" | "home_probe";

export interface MonitorCounters {
  readonly checksPerformed: number;
  readonly incidents: number;
  readonly leftForeground: number;
  readonly visualChanges: number;
  readonly rotationsIgnored: number;
  readonly captureFailures: number;
}

export interface IncidentSnapshotRef {
  /** Name of the copy inside the incident directory. */
  readonly file: string;
  readonly source: string;
  readonly capturedAt: number;
  readonly wallClock: string;
  readonly activity: string | null;
}

export interface Incident {
  readonly id: string;
  readonly directory: string;
  readonly triggeredAt: string;
  readonly reason: IncidentReason;
  readonly triggeringEventKind: EventKind | null;
  readonly changeRatio: number | null;
  readonly hashDistance: number | null;
  readonly snapshots: readonly IncidentSnapshotRef[];
  readonly counters: MonitorCounters;
}

export interface MonitorStatus {
  readonly running: boolean;
  readonly phase: MonitorPhase;
  readonly tickNumber: number;
  readonly checksPerformed: number;
  readonly incidents: number;
  readonly lastError: string | null;
}

export type TickOutcome =
  | { readonly kind: "capture_failed"; readonly error: string }
  | { readonly kind: "insufficient_history" }
  | { readonly kind: "unchanged"; readonly changeRatio: number }
  | { readonly kind: "rotation"; readonly rotation: Rotation }
  | { readonly kind: "incident"; readonly incident: Incident }
  /** The capture was cut short by `stop()` or `pause()`. */
  | { readonly kind: "aborted" }
  /** The monitor is paused; nothing was sampled. */
  | { readonly kind: "held" }
  | { readonly kind: "error"; readonly error: string };

/** Anything that can capture a snapshot, normally a `SnapshotSampler`. */
export interface SnapshotSource {
  capture(signal?: AbortSignal): Promise<CaptureResult>;
}

/** Screenshots taken before pressing HOME and after relaunching the app. */
export interface HomeReturnPair {
  readonly attempt: number;
  readonly before: Snapshot;
  readonly after: Snapshot;
}

/** Anything that yields new driver events, normally an `EventStreamReader`. */
export interface EventSource {
  poll(): Promise<readonly EventRecord[]>;
}

export interface MonitorConfig {
  /**
   * Package of the app under test; other foreground packages count as
   * leaving the app. Null when the app is unknown, which turns that check off.
   */
  readonly targetPackage: string | null;
  readonly outputDir: string;
  readonly intervalMs?: number;
  /** Fingerprint distance above which a home-and-relaunch pair becomes an incident. */
  readonly homeThreshold?: number;
  readonly pixelThreshold?: number;
  readonly areaFractionThreshold?: number;
  readonly rotationThreshold?: number;
  readonly eventHistorySize?: number;
  readonly snapshotHistorySize?: number;
}

export interface ResolvedMonitorConfig {
  readonly targetPackage: string | null;
  readonly outputDir: string;
  readonly intervalMs: number;
  readonly homeThreshold: number;
  readonly pixelThreshold: number;
  readonly areaFractionThreshold: number;
  readonly rotationThreshold: number;
  readonly eventHistorySize: number;
  readonly snapshotHistorySize: number;
}

export interface MonitorDependencies {
  readonly sampler: SnapshotSource;
  readonly events: EventSource;
  readonly clock?: Clock;
  readonly logger?: Logger;
}
