/**
 * App identity from the driver's `app.json`.
 */

import { readFile } from "node:fs/promises";
import type { AppInfo, Logger } from "@droidprobe/core";
import { silentLogger } from "@droidprobe/core";
import { getErrorMessage } from "@droidprobe/errors";
import { z } from "zod";

const AppJsonSchema = z.object({
  package: z.string().min(1),
  main_activity: z.string().min(1),
  activities: z.array(z.string()).optional(),
});

/**
 * Reads `{ package, main_activity, activities? }`. A missing or malformed
 * file yields null and a warning: the app identity is then unknown and the
 * session runs without the checks that depend on it.
 */
export async function loadAppInfo(path: string, logger: Logger = silentLogger): Promise<AppInfo | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    logger.warn(`could not read ${path}: ${getErrorMessage(error)}; app identity unknown`);
    return null;
  }

  const result = AppJsonSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    logger.warn(`invalid app info in ${path} (${issues}); app identity unknown`);
    return null;
  }

  return {
    packageName: result.data.package,
    mainActivity: result.data.main_activity,
    activities: result.data.activities ?? [],
  };
}

export function describeApp(app: AppInfo | null): string {
  return app === null ? "unknown" : `${app.packageName}/${app.mainActivity}`;
}
