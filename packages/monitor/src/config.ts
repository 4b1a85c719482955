/**
 * Configuration validation and resolution.
 */

import { MonitorConfigurationError } from "@droidprobe/errors";
import {
  DEFAULT_AREA_FRACTION_THRESHOLD,
  DEFAULT_PIXEL_THRESHOLD,
  DEFAULT_ROTATION_THRESHOLD,
} from "@droidprobe/vision";
import { z } from "zod";
import {
  DEFAULT_EVENT_HISTORY_SIZE,
  DEFAULT_HOME_THRESHOLD,
  DEFAULT_INTERVAL_MS,
  DEFAULT_SNAPSHOT_HISTORY_SIZE,
} from "./constants.js";
import type { MonitorConfig, ResolvedMonitorConfig } from "./types.js";

const fraction = z.number().min(0).max(1);

const monitorConfigSchema = z.object({
  targetPackage: z.string().min(1, { message: "targetPackage must not be empty" }).nullable(),
  outputDir: z.string().min(1, { message: "outputDir must not be empty" }),
  intervalMs: z.number().int().positive({ message: "intervalMs must be a positive integer" }).optional(),
  homeThreshold: z.number().int().min(0).optional(),
  pixelThreshold: z.number().int().min(0).max(255).optional(),
  areaFractionThreshold: fraction.optional(),
  rotationThreshold: fraction.optional(),
  eventHistorySize: z.number().int().positive().optional(),
  snapshotHistorySize: z
    .number()
    .int()
    .min(2, { message: "snapshotHistorySize must keep at least two snapshots" })
    .optional(),
});

/**
 * Validates and resolves a {@link MonitorConfig} with all defaults applied.
 *
 * @throws {MonitorConfigurationError} on invalid input
 */
export function resolveMonitorConfig(config: MonitorConfig): ResolvedMonitorConfig {
  const parsed = monitorConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new MonitorConfigurationError(issues.join("; "));
  }

  const value = parsed.data;
  return {
    targetPackage: value.targetPackage,
    outputDir: value.outputDir,
    intervalMs: value.intervalMs ?? DEFAULT_INTERVAL_MS,
    homeThreshold: value.homeThreshold ?? DEFAULT_HOME_THRESHOLD,
    pixelThreshold: value.pixelThreshold ?? DEFAULT_PIXEL_THRESHOLD,
    areaFractionThreshold: value.areaFractionThreshold ?? DEFAULT_AREA_FRACTION_THRESHOLD,
    rotationThreshold: value.rotationThreshold ?? DEFAULT_ROTATION_THRESHOLD,
    eventHistorySize: value.eventHistorySize ?? DEFAULT_EVENT_HISTORY_SIZE,
    snapshotHistorySize: value.snapshotHistorySize ?? DEFAULT_SNAPSHOT_HISTORY_SIZE,
  };
}
