export const DEFAULT_ADB_PATH = "adb";

/** Time between SIGTERM and SIGKILL for a command that overran its deadline. */
export const DEFAULT_KILL_GRACE_MS = 2_000;

export const DEFAULT_COMMAND_TIMEOUT_MS = 5_000;
export const DEFAULT_STRATEGY_TIMEOUT_MS = 10_000;
export const DEFAULT_CAPTURE_RETRIES = 3;
export const DEFAULT_CAPTURE_BACKOFF_MS = 2_000;

export const SNAPSHOT_DIRECTORY = "monitor_states";
export const REMOTE_SCREENSHOT_PATH = "/sdcard/droidprobe_screen.png";

/** Unlock gesture used after a power cycle: bottom-to-top swipe. */
export const UNLOCK_SWIPE = { x1: 500, y1: 1500, x2: 500, y2: 500, durationMs: 300 } as const;
