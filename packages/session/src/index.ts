export { describeApp, loadAppInfo } from "./app-info.js";
export { applyCliOverrides, HELP, type ParsedArgs, parseArgv } from "./args.js";
export {
  defaultOutputDir,
  loadSessionConfig,
  type ParseSessionConfigOptions,
  parseSessionConfigDocument,
  parseSessionConfigYaml,
  readSessionConfigDocument,
  resolveSessionConfig,
  type SessionConfigInput,
  validateSessionConfig,
} from "./config.js";
export {
  DEFAULT_DRIVER_COMMAND,
  DEFAULT_DRIVER_GRACE_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SESSION_TIMEOUT_MS,
  DEFAULT_STARTUP_TIMEOUT_MS,
  PACKAGE_NAME,
  SESSION_REPORT_FILE,
} from "./constants.js";
export {
  buildDriverArgs,
  type DriverCommand,
  type DriverExit,
  type DriverLauncher,
  type DriverProcess,
  SpawnDriverLauncher,
} from "./driver.js";
export { interpolateEnvVars } from "./interpolation.js";
export { SessionOrchestrator, type SessionResult } from "./orchestrator.js";
export { TerminalReporter, type TerminalReporterOptions } from "./reporters/terminal-reporter.js";
export {
  activityClassName,
  activityCoverage,
  collectVisitedActivities,
  computeStatistics,
  saveSessionReport,
  type StatisticsInput,
} from "./summary.js";
export type {
  ActivityCoverage,
  AnalysisConfig,
  CaptureConfig,
  DriverConfig,
  ResolvedSessionConfig,
  SessionConfig,
  SessionDependencies,
  SessionEndReason,
  SessionMonitorConfig,
  SessionReport,
  SessionStatistics,
} from "./types.js";
