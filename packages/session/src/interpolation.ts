/**
 * Environment variable interpolation for YAML session files.
 * Supports `${VAR}` and `${VAR:default}` (Docker Compose convention).
 */

import { SessionConfigurationError } from "@droidprobe/errors";

const ENV_VAR_REGEX = /\$\{([^}:]+?)(?::([^}]*))?\}/g;

/**
 * Replace `${VAR}` and `${VAR:default}` tokens with values from `env`.
 * An empty value counts as set. Substituted values are not expanded again.
 *
 * @throws {SessionConfigurationError} listing every variable that is unset and has no default
 */
export function interpolateEnvVars(
  template: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
  source?: string,
): string {
  const missing: string[] = [];

  const result = template.replace(ENV_VAR_REGEX, (_match, name: string, fallback?: string) => {
    const value = env[name];
    if (value !== undefined) return value;
    if (fallback !== undefined) return fallback;
    missing.push(name);
    return "";
  });

  if (missing.length > 0) {
    throw new SessionConfigurationError(
      missing.map((name) => `environment variable ${name} is not set`),
      source,
    );
  }
  return result;
}
