/**
 * IncidentStore: persists one directory per data-loss incident and
 * aggregates them into the session's data-loss report.
 *
 * Layout: `<output>/data_loss_events/incident_<seq4>_<timestamp>/` holding
 * a copy of every snapshot in the history plus `manifest.json`.
 */

import { copyFile, mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import {
  type Clock,
  compactTimestamp,
  defaultClock,
  type EventKind,
  type EventRecord,
  type Logger,
  padSequence,
  silentLogger,
} from "@droidprobe/core";
import type { Snapshot } from "@droidprobe/device";
import { getErrorMessage, IncidentWriteError, toError } from "@droidprobe/errors";
import { z } from "zod";
import { DATA_LOSS_REPORT_FILE, INCIDENT_DIRECTORY, INCIDENT_MANIFEST_FILE } from "./constants.js";
import type { Incident, IncidentReason, IncidentSnapshotRef, MonitorCounters } from "./types.js";

export interface IncidentDraft {
  readonly reason: IncidentReason;
  readonly triggeringEventKind: EventKind | null;
  readonly changeRatio: number | null;
  readonly hashDistance: number | null;
  readonly snapshots: readonly Snapshot[];
  readonly recentEvents: readonly EventRecord[];
  readonly counters: MonitorCounters;
}

export interface IncidentStoreOptions {
  readonly clock?: Clock;
  readonly logger?: Logger;
}

const countersSchema = z.object({
  checksPerformed: z.number(),
  incidents: z.number(),
  leftForeground: z.number(),
  visualChanges: z.number(),
  rotationsIgnored: z.number(),
  captureFailures: z.number(),
});

const manifestSchema = z.object({
  id: z.string(),
  triggeredAt: z.string(),
  reason: z.enum(["left_foreground", "visual_change", "home_probe"]),
  triggeringEventKind: z.string().nullable(),
  changeRatio: z.number().nullable(),
  hashDistance: z.number().nullable(),
  snapshots: z.array(
    z.object({
      file: z.string(),
      source: z.string(),
      capturedAt: z.number(),
      wallClock: z.string(),
      activity: z.string().nullable(),
    }),
  ),
  recentEvents: z.array(z.object({ id: z.string(), kind: z.string() })),
  counters: countersSchema,
});

export type IncidentManifest = z.infer<typeof manifestSchema>;

export interface DataLossReport {
  readonly metadata: {
    readonly outputDirectory: string;
    readonly generatedAt: string;
  };
  readonly statistics: {
    readonly incidents: number;
    readonly byReason: Readonly<Record<IncidentReason, number>>;
  };
  /** Running counters of the monitor, null when rebuilt after the fact. */
  readonly counters: MonitorCounters | null;
  readonly incidents: readonly IncidentManifest[];
}

export class IncidentStore {
  readonly directory: string;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private sequence = 0;

  constructor(outputDir: string, options: IncidentStoreOptions = {}) {
    this.directory = join(outputDir, INCIDENT_DIRECTORY);
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws {IncidentWriteError} when the bundle cannot be written
   */
  async persist(draft: IncidentDraft): Promise<Incident> {
    const now = this.clock.now();
    this.sequence++;
    const id = `incident_${padSequence(this.sequence, 4)}_${compactTimestamp(now)}`;
    const directory = join(this.directory, id);

    try {
      await mkdir(directory, { recursive: true });
      const snapshots: IncidentSnapshotRef[] = [];
      for (const snapshot of draft.snapshots) {
        const file = basename(snapshot.imagePath);
        await copyFile(snapshot.imagePath, join(directory, file));
        snapshots.push({
          file,
          source: snapshot.imagePath,
          capturedAt: snapshot.capturedAt,
          wallClock: snapshot.wallClock,
          activity: snapshot.activity,
        });
      }

      const incident: Incident = {
        id,
        directory,
        triggeredAt: new Date(now).toISOString(),
        reason: draft.reason,
        triggeringEventKind: draft.triggeringEventKind,
        changeRatio: draft.changeRatio,
        hashDistance: draft.hashDistance,
        snapshots,
        counters: draft.counters,
      };
      const manifest: IncidentManifest = {
        id,
        triggeredAt: incident.triggeredAt,
        reason: incident.reason,
        triggeringEventKind: incident.triggeringEventKind,
        changeRatio: incident.changeRatio,
        hashDistance: incident.hashDistance,
        snapshots,
        recentEvents: draft.recentEvents.map((event) => ({ id: event.id, kind: event.kind })),
        counters: draft.counters,
      };
      await writeFile(join(directory, INCIDENT_MANIFEST_FILE), `${JSON.stringify(manifest, null, 2)}\n`);

      this.logger.warn(`data loss incident ${id}: ${draft.reason}`, {
        event: draft.triggeringEventKind,
        changeRatio: draft.changeRatio,
      });
      return incident;
    } catch (error) {
      throw new IncidentWriteError(directory, toError(error));
    }
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read every incident manifest under `<outputDir>/data_loss_events`, in
 * directory order. Unreadable manifests are skipped with a warning.
 */
export async function loadIncidentManifests(
  outputDir: string,
  logger: Logger = silentLogger,
): Promise<IncidentManifest[]> {
  const root = join(outputDir, INCIDENT_DIRECTORY);
  let names: string[];
  try {
    names = (await readdir(root)).filter((name) => name.startsWith("incident_")).sort();
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }

  const manifests: IncidentManifest[] = [];
  for (const name of names) {
    const path = join(root, name, INCIDENT_MANIFEST_FILE);
    try {
      const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
      manifests.push(manifestSchema.parse(raw));
    } catch (error) {
      logger.warn(`skipping incident manifest ${path}: ${getErrorMessage(error)}`);
    }
  }
  return manifests;
}

export interface DataLossReportOptions {
  readonly counters?: MonitorCounters;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Aggregate the incidents on disk into `data_loss_report.json`. Usable on
 * its own when a session ended without stopping the monitor.
 */
export async function buildDataLossReport(
  outputDir: string,
  options: DataLossReportOptions = {},
): Promise<DataLossReport> {
  const clock = options.clock ?? defaultClock;
  const incidents = await loadIncidentManifests(outputDir, options.logger);

  const byReason: Record<IncidentReason, number> = { left_foreground: 0, visual_change: 0, home_probe: 0 };
  for (const incident of incidents) {
    byReason[incident.reason]++;
  }

  const report: DataLossReport = {
    metadata: { outputDirectory: outputDir, generatedAt: new Date(clock.now()).toISOString() },
    statistics: { incidents: incidents.length, byReason },
    counters: options.counters ?? null,
    incidents,
  };

  await mkdir(outputDir, { recursive: true });
  await writeFile(join(outputDir, DATA_LOSS_REPORT_FILE), `${JSON.stringify(report, null, 2)}\n`);
  return report;
}
