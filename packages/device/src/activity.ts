/**
 * Foreground-activity parsing for `dumpsys activity activities` output.
 */

const ACTIVITY_PATTERNS = [
  /topResumedActivity=ActivityRecord\{[^}]*?\s(\S+\/\S+)/,
  /mResumedActivity:\s*ActivityRecord\{[^}]*?\s(\S+\/\S+)/,
  /mFocusedActivity:\s*ActivityRecord\{[^}]*?\s(\S+\/\S+)/,
] as const;

/**
 * Extract the resumed component (`package/activity`) or null.
 * Patterns are tried in order: newer platforms report topResumedActivity.
 */
export function parseForegroundActivity(dumpsys: string): string | null {
  for (const pattern of ACTIVITY_PATTERNS) {
    const match = pattern.exec(dumpsys);
    const component = match?.[1];
    if (component) return component.replace(/[}\s]+$/, "");
  }
  return null;
}

/**
 * Package part of a `package/activity` component.
 */
export function componentPackage(component: string): string {
  const slash = component.indexOf("/");
  return slash === -1 ? component : component.slice(0, slash);
}

/**
 * Build the `-n` argument for `am start`.
 *
 * `.Main` and fully-qualified names are passed through; a bare class name is
 * qualified with the package.
 */
export function componentName(packageName: string, activity: string): string {
  if (activity.includes("/")) return activity;
  if (activity.startsWith(".") || activity.includes(".")) return `${packageName}/${activity}`;
  return `${packageName}/${packageName}.${activity}`;
}
