/**
 * Offline state-loss analysis over the driver's own artifacts.
 *
 * Event i is paired with state i + 1 (the screen after the event). Across
 * consecutive pairs it reports large fingerprint jumps, dialogs that were
 * later reported invisible, and EditText contents that changed between two
 * events on the same view.
 */

import { readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { type Clock, defaultClock, type EventPayload, type Logger, silentLogger } from "@droidprobe/core";
import { getErrorMessage, NotFoundError } from "@droidprobe/errors";
import { eventType, eventView, parseEventFile } from "@droidprobe/events";
import { fingerprintFile, hashDistance, type PerceptualHash } from "@droidprobe/vision";
import { directoryExists, listFiles, writeJsonReport } from "./files.js";

export const STATE_LOSS_REPORT_FILE = "state_loss_analysis.json";
export const DEFAULT_STATE_HASH_THRESHOLD = 10;

const EDIT_TEXT_CLASS = "android.widget.edittext";

export interface StateLossOptions {
  readonly hashThreshold?: number;
  readonly logger?: Logger;
  readonly clock?: Clock;
}

export interface HashMismatch {
  readonly event: string | null;
  readonly previousState: string;
  readonly currentState: string;
  readonly hashDifference: number;
  readonly timestamp: string;
}

export interface DisappearedDialog {
  readonly view: string;
  readonly event: string | null;
  readonly timestamp: string;
}

export interface EditTextChange {
  readonly view: string;
  readonly previousText: string | null;
  readonly currentText: string | null;
  readonly timestamp: string;
}

export interface StateLossReport {
  readonly metadata: {
    readonly outputDirectory: string;
    readonly analysisTime: string;
    readonly hashThreshold: number;
  };
  readonly issues: {
    readonly disappearedDialogs: readonly DisappearedDialog[];
    readonly edittextValueChanges: readonly EditTextChange[];
    readonly stateHashMismatches: readonly HashMismatch[];
  };
  readonly statistics: {
    readonly totalEventStatePairs: number;
    readonly stateTransitionsAnalyzed: number;
    readonly stateHashMismatches: number;
  };
}

interface StateInfo {
  readonly file: string;
  readonly hash: PerceptualHash;
  readonly timestamp: string;
}

type View = Readonly<Record<string, unknown>>;

/** `screen_2024-01-01_120000.png` → `2024-01-01_120000`. */
function stateTimestamp(file: string): string {
  const stem = basename(file, extname(file));
  const underscore = stem.indexOf("_");
  return underscore === -1 ? stem : stem.slice(underscore + 1);
}

function stringField(view: View, key: string): string | null {
  const value = view[key];
  return typeof value === "string" ? value : null;
}

function viewId(view: View): string | null {
  return stringField(view, "resource_id") || stringField(view, "signature");
}

function eventName(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/**
 * @throws {NotFoundError} when `events/` or `states/` is missing
 */
export async function analyzeStateLoss(
  outputDir: string,
  options: StateLossOptions = {},
): Promise<StateLossReport> {
  const threshold = options.hashThreshold ?? DEFAULT_STATE_HASH_THRESHOLD;
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? defaultClock;
  const eventsDir = join(outputDir, "events");
  const statesDir = join(outputDir, "states");

  for (const dir of [eventsDir, statesDir]) {
    if (!(await directoryExists(dir))) {
      throw new NotFoundError({
        code: "ANALYSIS_DIRECTORY_NOT_FOUND",
        message: `Driver output directory not found: ${dir}`,
        metadata: { directory: dir },
      });
    }
  }

  const eventFiles = await listFiles(eventsDir, (name) => name.endsWith(".json"));
  const stateFiles = await listFiles(statesDir, (name) => name.toLowerCase().endsWith(".png"));

  const mismatches: HashMismatch[] = [];
  const dialogs: DisappearedDialog[] = [];
  const edits: EditTextChange[] = [];
  const previousViews = new Map<string, View>();
  let previous: StateInfo | null = null;
  let pairs = 0;
  let transitions = 0;

  const pairCount = Math.min(eventFiles.length, stateFiles.length - 1);
  for (let i = 0; i < pairCount; i++) {
    const eventFile = eventFiles[i];
    const stateFile = stateFiles[i + 1];
    if (eventFile === undefined || stateFile === undefined) break;

    let current: StateInfo;
    let payload: EventPayload;
    try {
      payload = parseEventFile(await readFile(join(eventsDir, eventFile), "utf-8"), eventFile).payload;
      current = {
        file: stateFile,
        hash: await fingerprintFile(join(statesDir, stateFile)),
        timestamp: stateTimestamp(stateFile),
      };
    } catch (error) {
      logger.warn(`error processing ${eventFile}/${stateFile}: ${getErrorMessage(error)}`);
      continue;
    }
    pairs++;

    if (previous !== null) {
      transitions++;
      const type = eventName(eventType(payload));

      const difference = hashDistance(previous.hash, current.hash);
      if (difference > threshold) {
        mismatches.push({
          event: type,
          previousState: previous.file,
          currentState: current.file,
          hashDifference: difference,
          timestamp: current.timestamp,
        });
      }

      const view = eventView(payload);
      const id = view === null ? null : viewId(view);
      if (view !== null && id !== null) {
        const before = previousViews.get(id);
        if (before !== undefined) {
          const beforeClass = (stringField(before, "class") ?? "").toLowerCase();
          if (beforeClass.endsWith("dialog") && view["visible"] === false) {
            dialogs.push({ view: id, event: type, timestamp: current.timestamp });
          }
          const beforeText = stringField(before, "text");
          const currentText = stringField(view, "text");
          if (beforeClass === EDIT_TEXT_CLASS && beforeText !== currentText) {
            edits.push({ view: id, previousText: beforeText, currentText, timestamp: current.timestamp });
          }
        }
        previousViews.set(id, view);
      }
    }

    previous = current;
  }

  return {
    metadata: {
      outputDirectory: outputDir,
      analysisTime: new Date(clock.now()).toISOString(),
      hashThreshold: threshold,
    },
    issues: {
      disappearedDialogs: dialogs,
      edittextValueChanges: edits,
      stateHashMismatches: mismatches,
    },
    statistics: {
      totalEventStatePairs: pairs,
      stateTransitionsAnalyzed: transitions,
      stateHashMismatches: mismatches.length,
    },
  };
}

export function saveStateLossReport(report: StateLossReport, outputDir: string): Promise<string> {
  return writeJsonReport(outputDir, STATE_LOSS_REPORT_FILE, report);
}
