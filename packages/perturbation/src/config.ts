/**
 * Configuration validation and resolution.
 */

import { PerturbationConfigurationError } from "@droidprobe/errors";
import { z } from "zod";
import {
  DEFAULT_HOME_PROBE_INTERVAL_MS,
  DEFAULT_HOME_RETURN_DELAY_MS,
  DEFAULT_MAX_HOME_PROBES,
  DEFAULT_MAX_POWER_CYCLES,
  DEFAULT_POWER_CYCLE_INTERVAL_MS,
  DEFAULT_RELAUNCH_SETTLE_MS,
  DEFAULT_ROTATION_INTERVAL_MS,
  DEFAULT_ROTATION_STEP_DELAY_MS,
  DEFAULT_SCREEN_OFF_MS,
} from "./constants.js";
import type { PerturbationConfig, ResolvedPerturbationConfig } from "./types.js";

const delay = z.number().int().min(0);
const count = z.number().int().min(0);

const perturbationConfigSchema = z.object({
  app: z
    .object({
      packageName: z.string().min(1, { message: "app.packageName must not be empty" }),
      mainActivity: z.string().min(1, { message: "app.mainActivity must not be empty" }),
      activities: z.array(z.string()),
    })
    .nullable(),
  outputDir: z.string().min(1, { message: "outputDir must not be empty" }),
  rotation: z
    .object({
      enabled: z.boolean().optional(),
      minIntervalMs: delay.optional(),
      stepDelayMs: delay.optional(),
    })
    .optional(),
  powerCycle: z
    .object({
      enabled: z.boolean().optional(),
      minIntervalMs: delay.optional(),
      maxCycles: count.optional(),
      screenOffMs: delay.optional(),
    })
    .optional(),
  homeProbe: z
    .object({
      enabled: z.boolean().optional(),
      minHomeIntervalMs: delay.optional(),
      maxHomeProbes: count.optional(),
      returnDelayMs: delay.optional(),
      settleMs: delay.optional(),
    })
    .optional(),
});

/**
 * Validates and resolves a {@link PerturbationConfig} with all defaults applied.
 *
 * @throws {PerturbationConfigurationError} on invalid input
 */
export function resolvePerturbationConfig(config: PerturbationConfig): ResolvedPerturbationConfig {
  const parsed = perturbationConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new PerturbationConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    );
  }

  const { rotation, powerCycle, homeProbe } = parsed.data;
  const homeEnabled = homeProbe?.enabled ?? true;
  if (homeEnabled && config.app === null) {
    throw new PerturbationConfigurationError("app: required while homeProbe is enabled");
  }

  return {
    app: config.app,
    outputDir: parsed.data.outputDir,
    rotation: {
      enabled: rotation?.enabled ?? true,
      minIntervalMs: rotation?.minIntervalMs ?? DEFAULT_ROTATION_INTERVAL_MS,
      stepDelayMs: rotation?.stepDelayMs ?? DEFAULT_ROTATION_STEP_DELAY_MS,
    },
    powerCycle: {
      enabled: powerCycle?.enabled ?? true,
      minIntervalMs: powerCycle?.minIntervalMs ?? DEFAULT_POWER_CYCLE_INTERVAL_MS,
      maxCycles: powerCycle?.maxCycles ?? DEFAULT_MAX_POWER_CYCLES,
      screenOffMs: powerCycle?.screenOffMs ?? DEFAULT_SCREEN_OFF_MS,
    },
    homeProbe: {
      enabled: homeEnabled,
      minHomeIntervalMs: homeProbe?.minHomeIntervalMs ?? DEFAULT_HOME_PROBE_INTERVAL_MS,
      maxHomeProbes: homeProbe?.maxHomeProbes ?? DEFAULT_MAX_HOME_PROBES,
      returnDelayMs: homeProbe?.returnDelayMs ?? DEFAULT_HOME_RETURN_DELAY_MS,
      settleMs: homeProbe?.settleMs ?? DEFAULT_RELAUNCH_SETTLE_MS,
    },
  };
}
