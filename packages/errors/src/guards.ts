/**
 * Type guards over the catalog's behavioral flags.
 */

/**
 * Check if an error represents an expected condition, such as bad
 * configuration or a missing file. Returns false for values that are not
 * catalogued errors.
 */
export function isExpectedError(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "isExpected" in error &&
    error.isExpected === true
  );
}
