import { mkdir, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Sorted names in `directory` that pass `filter`; empty when the directory
 * does not exist.
 */
export async function listFiles(
  directory: string,
  filter: (name: string) => boolean,
): Promise<string[]> {
  try {
    return (await readdir(directory)).filter(filter).sort();
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }
}

export async function directoryExists(directory: string): Promise<boolean> {
  try {
    await readdir(directory);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

/**
 * Write `data` as indented JSON to `<directory>/<name>` and return the path.
 */
export async function writeJsonReport(directory: string, name: string, data: unknown): Promise<string> {
  await mkdir(directory, { recursive: true });
  const path = join(directory, name);
  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
  return path;
}

/**
 * `part / whole`, 0 when `whole` is 0, rounded to `digits` decimals.
 */
export function rate(part: number, whole: number, digits = 4): number {
  if (whole === 0) return 0;
  const factor = 10 ** digits;
  return Math.round((part / whole) * factor) / factor;
}
