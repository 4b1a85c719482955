/**
 * Session configuration: Zod validation, defaults and YAML loading.
 *
 * YAML pipeline:
 * 1. Interpolate `${VAR}` / `${VAR:default}` env vars
 * 2. Parse YAML
 * 3. (CLI only) apply command-line overrides
 * 4. Validate against the session schema and apply defaults
 */

import { readFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { DEFAULT_CRASH_SIMILARITY_THRESHOLD, DEFAULT_HOME_PROBE_THRESHOLD } from "@droidprobe/analysis";
import {
  DEFAULT_ADB_PATH,
  DEFAULT_CAPTURE_BACKOFF_MS,
  DEFAULT_CAPTURE_RETRIES,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_STRATEGY_TIMEOUT_MS,
} from "@droidprobe/device";
import { SessionConfigNotFoundError, SessionConfigurationError } from "@droidprobe/errors";
import { DEFAULT_INTERVAL_MS } from "@droidprobe/monitor";
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
} from "@droidprobe/perturbation";
import {
  DEFAULT_AREA_FRACTION_THRESHOLD,
  DEFAULT_PIXEL_THRESHOLD,
  DEFAULT_ROTATION_THRESHOLD,
} from "@droidprobe/vision";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import {
  DEFAULT_APP_INFO_PATH,
  DEFAULT_DRIVER_COMMAND,
  DEFAULT_DRIVER_GRACE_MS,
  DEFAULT_OUTPUT_ROOT,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SESSION_TIMEOUT_MS,
  DEFAULT_STARTUP_TIMEOUT_MS,
} from "./constants.js";
import { interpolateEnvVars } from "./interpolation.js";
import type { ResolvedSessionConfig } from "./types.js";

const duration = z.number().int().min(0);
const positiveDuration = z.number().int().min(1);
const count = z.number().int().min(0);
const fraction = z.number().min(0).max(1);

const SessionConfigSchema = z
  .object({
    apk: z.string().min(1, { message: "apk must not be empty" }),
    outputDir: z.string().min(1).optional(),
    serial: z.string().min(1).optional(),
    adbPath: z.string().min(1).optional(),
    commandTimeoutMs: positiveDuration.optional(),
    timeoutMs: positiveDuration.optional(),
    startupTimeoutMs: duration.optional(),
    pollIntervalMs: positiveDuration.optional(),
    appInfoPath: z.string().min(1).optional(),
    app: z
      .object({
        packageName: z.string().min(1),
        mainActivity: z.string().min(1),
        activities: z.array(z.string()).default([]),
      })
      .optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
    driver: z
      .object({
        command: z.string().min(1).optional(),
        keepEnv: z.boolean().optional(),
        grantPermissions: z.boolean().optional(),
        extraArgs: z.array(z.string()).optional(),
        graceMs: duration.optional(),
      })
      .strict()
      .optional(),
    capture: z
      .object({
        retries: z.number().int().min(1).optional(),
        backoffMs: duration.optional(),
        strategyTimeoutMs: positiveDuration.optional(),
        captureViewTree: z.boolean().optional(),
      })
      .strict()
      .optional(),
    monitor: z
      .object({
        enabled: z.boolean().optional(),
        intervalMs: positiveDuration.optional(),
        pixelThreshold: z.number().int().min(0).max(255).optional(),
        areaFractionThreshold: fraction.optional(),
        rotationThreshold: fraction.optional(),
      })
      .strict()
      .optional(),
    rotation: z
      .object({
        enabled: z.boolean().optional(),
        minIntervalMs: duration.optional(),
        stepDelayMs: duration.optional(),
      })
      .strict()
      .optional(),
    powerCycle: z
      .object({
        enabled: z.boolean().optional(),
        minIntervalMs: duration.optional(),
        maxCycles: count.optional(),
        screenOffMs: duration.optional(),
      })
      .strict()
      .optional(),
    homeProbe: z
      .object({
        enabled: z.boolean().optional(),
        minHomeIntervalMs: duration.optional(),
        maxHomeProbes: count.optional(),
        returnDelayMs: duration.optional(),
        settleMs: duration.optional(),
      })
      .strict()
      .optional(),
    analysis: z
      .object({
        crashSimilarityThreshold: count.optional(),
        homeProbeThreshold: count.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type SessionConfigInput = z.infer<typeof SessionConfigSchema>;

/**
 * Validates raw input (an object literal or parsed YAML) against the session schema.
 *
 * @throws {SessionConfigurationError} listing every issue as `path: message`
 */
export function validateSessionConfig(input: unknown, source?: string): SessionConfigInput {
  const result = SessionConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    throw new SessionConfigurationError(issues, source);
  }
  return result.data;
}

/** `output/<apk file name without extension>` */
export function defaultOutputDir(apk: string): string {
  return join(DEFAULT_OUTPUT_ROOT, basename(apk, extname(apk)));
}

/**
 * Validates and resolves a session config with all defaults applied.
 */
export function resolveSessionConfig(input: unknown, source?: string): ResolvedSessionConfig {
  const config = validateSessionConfig(input, source);
  const { driver, capture, monitor, rotation, powerCycle, homeProbe, analysis } = config;

  return {
    apk: config.apk,
    outputDir: config.outputDir ?? defaultOutputDir(config.apk),
    serial: config.serial ?? null,
    adbPath: config.adbPath ?? DEFAULT_ADB_PATH,
    commandTimeoutMs: config.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
    timeoutMs: config.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS,
    startupTimeoutMs: config.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS,
    pollIntervalMs: config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    appInfoPath: config.appInfoPath ?? DEFAULT_APP_INFO_PATH,
    app: config.app ?? null,
    logLevel: config.logLevel ?? "info",
    driver: {
      command: driver?.command ?? DEFAULT_DRIVER_COMMAND,
      keepEnv: driver?.keepEnv ?? false,
      grantPermissions: driver?.grantPermissions ?? false,
      extraArgs: driver?.extraArgs ?? [],
      graceMs: driver?.graceMs ?? DEFAULT_DRIVER_GRACE_MS,
    },
    capture: {
      retries: capture?.retries ?? DEFAULT_CAPTURE_RETRIES,
      backoffMs: capture?.backoffMs ?? DEFAULT_CAPTURE_BACKOFF_MS,
      strategyTimeoutMs: capture?.strategyTimeoutMs ?? DEFAULT_STRATEGY_TIMEOUT_MS,
      captureViewTree: capture?.captureViewTree ?? false,
    },
    monitor: {
      enabled: monitor?.enabled ?? true,
      intervalMs: monitor?.intervalMs ?? DEFAULT_INTERVAL_MS,
      pixelThreshold: monitor?.pixelThreshold ?? DEFAULT_PIXEL_THRESHOLD,
      areaFractionThreshold: monitor?.areaFractionThreshold ?? DEFAULT_AREA_FRACTION_THRESHOLD,
      rotationThreshold: monitor?.rotationThreshold ?? DEFAULT_ROTATION_THRESHOLD,
    },
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
      enabled: homeProbe?.enabled ?? true,
      minHomeIntervalMs: homeProbe?.minHomeIntervalMs ?? DEFAULT_HOME_PROBE_INTERVAL_MS,
      maxHomeProbes: homeProbe?.maxHomeProbes ?? DEFAULT_MAX_HOME_PROBES,
      returnDelayMs: homeProbe?.returnDelayMs ?? DEFAULT_HOME_RETURN_DELAY_MS,
      settleMs: homeProbe?.settleMs ?? DEFAULT_RELAUNCH_SETTLE_MS,
    },
    analysis: {
      crashSimilarityThreshold: analysis?.crashSimilarityThreshold ?? DEFAULT_CRASH_SIMILARITY_THRESHOLD,
      homeProbeThreshold: analysis?.homeProbeThreshold ?? DEFAULT_HOME_PROBE_THRESHOLD,
    },
  };
}

export interface ParseSessionConfigOptions {
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** File name used in error messages. */
  readonly source?: string;
}

/**
 * Interpolates and parses a YAML session document without validating it.
 *
 * @throws {SessionConfigurationError} on unset env vars or YAML syntax errors
 */
export function parseSessionConfigDocument(
  yamlString: string,
  options?: ParseSessionConfigOptions,
): unknown {
  const interpolated = interpolateEnvVars(yamlString, options?.env, options?.source);

  try {
    return parseYaml(interpolated);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      const where = pos ? `line ${pos.line}, column ${pos.col}: ` : "";
      throw new SessionConfigurationError([`${where}${error.message}`], options?.source);
    }
    throw error;
  }
}

/**
 * Parses a YAML session file into a resolved config.
 */
export function parseSessionConfigYaml(
  yamlString: string,
  options?: ParseSessionConfigOptions,
): ResolvedSessionConfig {
  return resolveSessionConfig(parseSessionConfigDocument(yamlString, options), options?.source);
}

/**
 * Reads a YAML session file and returns the parsed, not yet validated document.
 *
 * @throws {SessionConfigNotFoundError} when the file does not exist
 */
export async function readSessionConfigDocument(
  filePath: string,
  options?: Omit<ParseSessionConfigOptions, "source">,
): Promise<unknown> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new SessionConfigNotFoundError(absolutePath);
    }
    throw error;
  }

  return parseSessionConfigDocument(content, { ...options, source: absolutePath });
}

/**
 * Reads and resolves a YAML session file.
 */
export async function loadSessionConfig(
  filePath: string,
  options?: Omit<ParseSessionConfigOptions, "source">,
): Promise<ResolvedSessionConfig> {
  return resolveSessionConfig(await readSessionConfigDocument(filePath, options), resolve(filePath));
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
