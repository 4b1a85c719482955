export { resolveMonitorConfig } from "./config.js";
export {
  DATA_LOSS_REPORT_FILE,
  DEFAULT_EVENT_HISTORY_SIZE,
  DEFAULT_HOME_THRESHOLD,
  DEFAULT_INTERVAL_MS,
  DEFAULT_SNAPSHOT_HISTORY_SIZE,
  INCIDENT_DIRECTORY,
  INCIDENT_MANIFEST_FILE,
  PACKAGE_NAME,
} from "./constants.js";
export {
  buildDataLossReport,
  type DataLossReport,
  type DataLossReportOptions,
  type IncidentDraft,
  type IncidentManifest,
  IncidentStore,
  type IncidentStoreOptions,
  loadIncidentManifests,
} from "./incident-store.js";
export { createDataLossMonitor, DataLossMonitor } from "./monitor.js";
export type {
  EventSource,
  HomeReturnPair,
  Incident,
  IncidentReason,
  IncidentSnapshotRef,
  MonitorConfig,
  MonitorCounters,
  MonitorDependencies,
  MonitorPhase,
  MonitorStatus,
  ResolvedMonitorConfig,
  SnapshotSource,
  TickOutcome,
} from "./types.js";
