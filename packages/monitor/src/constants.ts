export const PACKAGE_NAME = "@droidprobe/monitor";

export const DEFAULT_INTERVAL_MS = 30_000;
export const DEFAULT_EVENT_HISTORY_SIZE = 20;
export const DEFAULT_SNAPSHOT_HISTORY_SIZE = 5;
/** Same default as the offline home-button analysis. */
export const DEFAULT_HOME_THRESHOLD = 10;

export const INCIDENT_DIRECTORY = "data_loss_events";
export const INCIDENT_MANIFEST_FILE = "manifest.json";
export const DATA_LOSS_REPORT_FILE = "data_loss_report.json";
