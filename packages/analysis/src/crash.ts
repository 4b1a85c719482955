/**
 * Crash Detector.
 *
 * The first state of a session is taken to be the launcher or the app's
 * first screen. A later state whose fingerprint lies within
 * `similarityThreshold` bits of it means the app was thrown back there,
 * which is reported as a crash. Apps whose navigation legitimately returns
 * to their first screen produce false positives.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { type Clock, defaultClock, type EventPayload, type Logger, silentLogger } from "@droidprobe/core";
import { getErrorMessage } from "@droidprobe/errors";
import { parseEventFile } from "@droidprobe/events";
import { fingerprintFile, hashDistance, type PerceptualHash } from "@droidprobe/vision";
import { listFiles, rate, writeJsonReport } from "./files.js";

export const CRASH_REPORT_FILE = "crash_report.json";
export const DEFAULT_CRASH_SIMILARITY_THRESHOLD = 5;

export interface CrashAnalysisOptions {
  readonly similarityThreshold?: number;
  readonly logger?: Logger;
  readonly clock?: Clock;
}

export interface CrashEntry {
  /** Position of the state in the sorted state list. */
  readonly index: number;
  readonly sourceFile: string;
  readonly hashDistance: number;
  readonly eventFile: string | null;
  readonly event: EventPayload | null;
}

export interface CrashReport {
  readonly metadata: {
    readonly sourceDirectory: string;
    readonly eventsDirectory: string;
    readonly analysisTime: string;
    readonly similarityThreshold: number;
  };
  readonly statistics: {
    readonly totalStatesAnalyzed: number;
    readonly crashesDetected: number;
    readonly crashRate: number;
  };
  readonly crashes: readonly CrashEntry[];
}

const isStateImage = (name: string): boolean => name.toLowerCase().endsWith(".png");
const isEventFile = (name: string): boolean => name.endsWith(".json");

async function tryFingerprint(path: string, logger: Logger): Promise<PerceptualHash | null> {
  try {
    return await fingerprintFile(path);
  } catch (error) {
    logger.warn(`skipping state ${path}: ${getErrorMessage(error)}`);
    return null;
  }
}

async function loadEvent(
  eventsDir: string,
  name: string | undefined,
  logger: Logger,
): Promise<EventPayload | null> {
  if (name === undefined) return null;
  try {
    return parseEventFile(await readFile(join(eventsDir, name), "utf-8"), name).payload;
  } catch (error) {
    logger.warn(`cannot attach event ${name}: ${getErrorMessage(error)}`);
    return null;
  }
}

export async function analyzeCrashes(
  statesDir: string,
  eventsDir: string,
  options: CrashAnalysisOptions = {},
): Promise<CrashReport> {
  const threshold = options.similarityThreshold ?? DEFAULT_CRASH_SIMILARITY_THRESHOLD;
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? defaultClock;

  const states = await listFiles(statesDir, isStateImage);
  const events = await listFiles(eventsDir, isEventFile);

  const crashes: CrashEntry[] = [];
  let analyzed = 0;

  const [referenceFile, ...rest] = states;
  const reference =
    referenceFile === undefined ? null : await tryFingerprint(join(statesDir, referenceFile), logger);

  if (reference !== null) {
    for (const [offset, file] of rest.entries()) {
      const index = offset + 1;
      const hash = await tryFingerprint(join(statesDir, file), logger);
      if (hash === null) continue;
      analyzed++;

      const distance = hashDistance(reference, hash);
      if (distance <= threshold) {
        const eventFile = events[index] ?? null;
        crashes.push({
          index,
          sourceFile: file,
          hashDistance: distance,
          eventFile,
          event: await loadEvent(eventsDir, events[index], logger),
        });
        logger.info(`potential crash at state ${index} (${file}), distance ${distance}`);
      }
    }
  }

  return {
    metadata: {
      sourceDirectory: statesDir,
      eventsDirectory: eventsDir,
      analysisTime: new Date(clock.now()).toISOString(),
      similarityThreshold: threshold,
    },
    statistics: {
      totalStatesAnalyzed: analyzed,
      crashesDetected: crashes.length,
      crashRate: rate(crashes.length, analyzed),
    },
    crashes,
  };
}

/**
 * Indices of the states classified as crashes.
 */
export async function detectCrashes(
  statesDir: string,
  eventsDir: string,
  options: CrashAnalysisOptions = {},
): Promise<number[]> {
  const report = await analyzeCrashes(statesDir, eventsDir, options);
  return report.crashes.map((crash) => crash.index);
}

export function saveCrashReport(report: CrashReport, outputDir: string): Promise<string> {
  return writeJsonReport(outputDir, CRASH_REPORT_FILE, report);
}
