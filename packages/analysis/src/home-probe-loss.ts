/**
 * Home-probe loss analysis: compares the screenshot taken before each
 * home-and-relaunch probe with the one taken after it. A large fingerprint
 * distance means the app did not restore what it showed.
 */

import { join } from "node:path";
import { type Clock, defaultClock, type Logger, silentLogger } from "@droidprobe/core";
import { getErrorMessage } from "@droidprobe/errors";
import { fingerprintFile, hashDistance } from "@droidprobe/vision";
import { listFiles, rate, writeJsonReport } from "./files.js";

export const HOME_PROBE_DIRECTORY = "home_button_screenshots";
export const HOME_PROBE_REPORT_FILE = "home_button_data_loss.json";
export const DEFAULT_HOME_PROBE_THRESHOLD = 10;

const BEFORE_PATTERN = /^before_(\d+)\.png$/;

export interface HomeProbeAnalysisOptions {
  readonly similarityThreshold?: number;
  readonly logger?: Logger;
  readonly clock?: Clock;
}

export interface HomeProbeAction {
  readonly actionIndex: number;
  readonly beforeImage: string;
  readonly afterImage: string;
  readonly hashDifference: number;
  readonly isPotentialDataLoss: boolean;
}

export interface HomeProbeLossReport {
  readonly metadata: {
    readonly outputDirectory: string;
    readonly analysisTime: string;
    readonly similarityThreshold: number;
  };
  readonly statistics: {
    readonly totalActionsAnalyzed: number;
    readonly potentialDataLoss: number;
    /** Rounded to 4 decimals. */
    readonly dataLossRate: number;
  };
  readonly actions: readonly HomeProbeAction[];
}

export async function analyzeHomeProbeLoss(
  outputDir: string,
  options: HomeProbeAnalysisOptions = {},
): Promise<HomeProbeLossReport> {
  const threshold = options.similarityThreshold ?? DEFAULT_HOME_PROBE_THRESHOLD;
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? defaultClock;
  const directory = join(outputDir, HOME_PROBE_DIRECTORY);

  const files = await listFiles(directory, (name) => name.endsWith(".png"));
  const present = new Set(files);
  const probes = files
    .filter((name) => BEFORE_PATTERN.test(name))
    .map((name) => ({ name, index: Number(BEFORE_PATTERN.exec(name)?.[1]) }))
    .sort((a, b) => a.index - b.index);

  const actions: HomeProbeAction[] = [];
  for (const { name, index } of probes) {
    const afterImage = `after_${index}.png`;
    const afterPath = join(directory, afterImage);
    if (!present.has(afterImage)) {
      logger.warn(`missing after image for home probe ${index}`);
      continue;
    }

    let difference: number;
    try {
      const [before, after] = await Promise.all([
        fingerprintFile(join(directory, name)),
        fingerprintFile(afterPath),
      ]);
      difference = hashDistance(before, after);
    } catch (error) {
      logger.warn(`skipping home probe ${index}: ${getErrorMessage(error)}`);
      continue;
    }

    const isPotentialDataLoss = difference > threshold;
    if (isPotentialDataLoss) {
      logger.info(`potential data loss in home probe ${index} (distance ${difference})`);
    }
    actions.push({
      actionIndex: index,
      beforeImage: name,
      afterImage,
      hashDifference: difference,
      isPotentialDataLoss,
    });
  }

  const lost = actions.filter((action) => action.isPotentialDataLoss).length;
  return {
    metadata: {
      outputDirectory: outputDir,
      analysisTime: new Date(clock.now()).toISOString(),
      similarityThreshold: threshold,
    },
    statistics: {
      totalActionsAnalyzed: actions.length,
      potentialDataLoss: lost,
      dataLossRate: rate(lost, actions.length),
    },
    actions,
  };
}

export function saveHomeProbeLossReport(report: HomeProbeLossReport, outputDir: string): Promise<string> {
  return writeJsonReport(outputDir, HOME_PROBE_REPORT_FILE, report);
}
