/**
 * Session statistics, activity coverage and `session_report.json`.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { type CrashReport, listFiles, rate, writeJsonReport } from "@droidprobe/analysis";
import type { Logger } from "@droidprobe/core";
import { silentLogger } from "@droidprobe/core";
import { getErrorMessage } from "@droidprobe/errors";
import type { IncidentManifest, MonitorCounters } from "@droidprobe/monitor";
import { z } from "zod";
import { SESSION_REPORT_FILE } from "./constants.js";
import type { ActivityCoverage, SessionReport, SessionStatistics } from "./types.js";

const StateFileSchema = z.object({ foreground_activity: z.string().min(1) });

/**
 * Fully-qualified class name of a `package/activity` component.
 * `pkg/.Main` expands to `pkg.Main`.
 */
export function activityClassName(component: string): string {
  const slash = component.indexOf("/");
  if (slash === -1) return component;
  const pkg = component.slice(0, slash);
  const activity = component.slice(slash + 1);
  return activity.startsWith(".") ? `${pkg}${activity}` : activity;
}

/**
 * Distinct foreground activities recorded in the driver's `states/*.json`.
 * Unreadable state files are skipped with a warning.
 */
export async function collectVisitedActivities(
  statesDir: string,
  logger: Logger = silentLogger,
): Promise<string[]> {
  const visited = new Set<string>();
  for (const name of await listFiles(statesDir, (n) => n.endsWith(".json"))) {
    try {
      const raw: unknown = JSON.parse(await readFile(join(statesDir, name), "utf-8"));
      const parsed = StateFileSchema.safeParse(raw);
      if (parsed.success) visited.add(activityClassName(parsed.data.foreground_activity));
    } catch (error) {
      logger.warn(`skipping state file ${name}: ${getErrorMessage(error)}`);
    }
  }
  return [...visited].sort();
}

export function activityCoverage(declared: readonly string[], visited: readonly string[]): ActivityCoverage {
  if (declared.length === 0) return { declared: 0, visited, ratio: null };
  const seen = new Set(visited);
  const unique = [...new Set(declared)];
  const covered = unique.filter((activity) => seen.has(activity)).length;
  return { declared: unique.length, visited, ratio: rate(covered, unique.length) };
}

export interface StatisticsInput {
  /** Counters of the monitor that ran this session, if any. */
  readonly counters: MonitorCounters | null;
  readonly incidents: readonly IncidentManifest[];
  readonly crashes: CrashReport;
}

/**
 * Recompute the session statistics from the artifacts on disk. Without live
 * counters the check count is the highest one recorded in an incident manifest.
 */
export function computeStatistics(input: StatisticsInput): SessionStatistics {
  const checksPerformed =
    input.counters?.checksPerformed ??
    input.incidents.reduce((max, incident) => Math.max(max, incident.counters.checksPerformed), 0);
  const incidents = input.incidents.length;

  return {
    checksPerformed,
    incidents,
    crashes: input.crashes.statistics.crashesDetected,
    crashRate: input.crashes.statistics.crashRate,
    incidentRate: rate(incidents, checksPerformed),
  };
}

export function saveSessionReport(report: SessionReport, outputDir: string): Promise<string> {
  return writeJsonReport(outputDir, SESSION_REPORT_FILE, report);
}
