import type { EventKind } from "@droidprobe/core";

export const PACKAGE_NAME = "@droidprobe/perturbation";

export const DEFAULT_ROTATION_INTERVAL_MS = 5_000;
/** Pause between the two console commands of a reverse-landscape turn. */
export const DEFAULT_ROTATION_STEP_DELAY_MS = 1_000;

export const DEFAULT_POWER_CYCLE_INTERVAL_MS = 30_000;
export const DEFAULT_MAX_POWER_CYCLES = 3;
export const DEFAULT_SCREEN_OFF_MS = 3_000;

export const DEFAULT_HOME_PROBE_INTERVAL_MS = 30_000;
export const DEFAULT_MAX_HOME_PROBES = 5;
export const DEFAULT_HOME_RETURN_DELAY_MS = 1_000;
export const DEFAULT_RELAUNCH_SETTLE_MS = 3_000;
export const HOME_PROBE_DIRECTORY = "home_button_screenshots";

export const KEYCODE_HOME = "KEYCODE_HOME";
export const KEYCODE_POWER = "KEYCODE_POWER";

export const ROTATION_TRIGGERS: readonly EventKind[] = [
  "key",
  "manual",
  "exit",
  "touch",
  "long_touch",
  "set_text",
  "select",
  "unselect",
  "intent",
  "spawn",
];

export const POWER_CYCLE_TRIGGERS: readonly EventKind[] = [
  "manual",
  "exit",
  "long_touch",
  "set_text",
  "spawn",
  "key",
];

export const HOME_PROBE_TRIGGERS: readonly EventKind[] = [
  "touch",
  "long_touch",
  "set_text",
  "spawn",
  "scroll",
  "swipe",
];
