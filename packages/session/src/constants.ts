export const PACKAGE_NAME = "@droidprobe/session";

export const DEFAULT_DRIVER_COMMAND = "droidbot";
export const DEFAULT_DRIVER_GRACE_MS = 5_000;
export const DEFAULT_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_SESSION_TIMEOUT_MS = 3_600_000;
/** Wait for the driver to create its output before perturbing anything. */
export const DEFAULT_STARTUP_TIMEOUT_MS = 60_000;
export const DEFAULT_OUTPUT_ROOT = "output";
export const DEFAULT_APP_INFO_PATH = "app.json";

export const EVENTS_DIRECTORY = "events";
export const STATES_DIRECTORY = "states";
export const SESSION_REPORT_FILE = "session_report.json";
