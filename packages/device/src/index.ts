export { type DeviceActionsOptions, DeviceActions, type Orientation } from "./actions.js";
export { componentName, componentPackage, parseForegroundActivity } from "./activity.js";
export { AdbTransport, type AdbTransportOptions } from "./adb-transport.js";
export {
  DEFAULT_ADB_PATH,
  DEFAULT_CAPTURE_BACKOFF_MS,
  DEFAULT_CAPTURE_RETRIES,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_STRATEGY_TIMEOUT_MS,
  SNAPSHOT_DIRECTORY,
} from "./constants.js";
export { type CaptureResult, SnapshotSampler, type SnapshotSamplerConfig } from "./sampler.js";
export { Snapshot, type SnapshotInit, type SnapshotJSON } from "./snapshot.js";
export {
  type CaptureContext,
  type CaptureStrategy,
  DEFAULT_STRATEGIES,
  emulatorConsole,
  execOutScreencap,
  shellScreencapPull,
  type StrategyOutcome,
} from "./strategies.js";
