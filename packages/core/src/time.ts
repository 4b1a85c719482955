/**
 * `YYYYMMDDTHHMMSSmmm` in UTC, used in artifact file and directory names.
 */
export function compactTimestamp(ms: number): string {
  return new Date(ms).toISOString().replace(/[-:]/g, "").replace(".", "").replace("Z", "");
}

/**
 * Zero-padded decimal, e.g. `padSequence(7, 4) === "0007"`.
 */
export function padSequence(n: number, width: number): string {
  return String(n).padStart(width, "0");
}
