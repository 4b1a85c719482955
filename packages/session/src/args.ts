/**
 * Command-line parsing for the `droidprobe` entrypoint.
 */

import { SessionConfigurationError } from "@droidprobe/errors";

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  o: "output",
  d: "serial",
  c: "config",
  t: "timeout",
  h: "help",
};

const BOOLEAN_FLAGS = new Set([
  "help",
  "no-rotate",
  "no-power-cycle",
  "no-home-probe",
  "no-monitor",
  "grant-perm",
  "keep-env",
]);

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    const key = arg.startsWith("--")
      ? arg.slice(2)
      : arg.startsWith("-") && arg.length === 2
        ? (ALIASES[arg.slice(1)] ?? arg.slice(1))
        : null;

    if (key === null) {
      positionals.push(arg);
    } else if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = true;
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    }

    i++;
  }

  return { positionals, flags };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  if (value === true) throw new SessionConfigurationError([`--${name} needs a value`]);
  return value === false ? undefined : value;
}

/** Whole seconds on the command line, milliseconds in the config. */
function secondsFlag(args: ParsedArgs, name: string): number | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new SessionConfigurationError([`--${name} must be a positive number of seconds, got "${value}"`]);
  }
  return Math.round(seconds * 1000);
}

function disable(document: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = document[key];
  return { ...(isRecord(section) ? section : {}), enabled: false };
}

/**
 * Layer command-line options over a session document (parsed YAML or `{}`).
 * Documents that are not objects are returned untouched for the schema to reject.
 */
export function applyCliOverrides(document: unknown, args: ParsedArgs): unknown {
  if (!isRecord(document)) return document;

  const result: Record<string, unknown> = { ...document };
  const apk = args.positionals[0];
  if (apk !== undefined) result["apk"] = apk;

  const output = stringFlag(args, "output");
  if (output !== undefined) result["outputDir"] = output;
  const serial = stringFlag(args, "serial");
  if (serial !== undefined) result["serial"] = serial;
  const logLevel = stringFlag(args, "log-level");
  if (logLevel !== undefined) result["logLevel"] = logLevel;

  const timeoutMs = secondsFlag(args, "timeout");
  if (timeoutMs !== undefined) result["timeoutMs"] = timeoutMs;
  const intervalMs = secondsFlag(args, "interval");
  if (intervalMs !== undefined) {
    const monitor = result["monitor"];
    result["monitor"] = { ...(isRecord(monitor) ? monitor : {}), intervalMs };
  }

  if (args.flags["no-monitor"] === true) result["monitor"] = disable(result, "monitor");
  if (args.flags["no-rotate"] === true) result["rotation"] = disable(result, "rotation");
  if (args.flags["no-power-cycle"] === true) result["powerCycle"] = disable(result, "powerCycle");
  if (args.flags["no-home-probe"] === true) result["homeProbe"] = disable(result, "homeProbe");

  if (args.flags["grant-perm"] === true || args.flags["keep-env"] === true) {
    const driver = result["driver"];
    result["driver"] = {
      ...(isRecord(driver) ? driver : {}),
      ...(args.flags["grant-perm"] === true ? { grantPermissions: true } : {}),
      ...(args.flags["keep-env"] === true ? { keepEnv: true } : {}),
    };
  }

  return result;
}

export const HELP = `
droidprobe: crash and UI data-loss hunting around an automated exploration session

Usage: droidprobe <apk> [options]
       droidprobe --config <session.yaml> [options]

Options:
  -o, --output <dir>      Output directory (default: output/<apk name>)
  -d, --serial <serial>   Device serial
  -c, --config <file>     YAML session file; options below override it
  -t, --timeout <sec>     Session timeout (default: 3600)
  --interval <sec>        Monitor sampling interval (default: 30)
  --log-level <level>     debug, info, warn or error (default: info)
  --no-monitor            Disable the data-loss monitor
  --no-rotate             Disable screen rotation
  --no-power-cycle        Disable power cycling
  --no-home-probe         Disable home-button probes
  --grant-perm            Pass -grant_perm to the driver
  --keep-env              Pass -keep_env to the driver
  -h, --help              Show this help message
`;
