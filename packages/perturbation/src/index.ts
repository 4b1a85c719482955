export { resolvePerturbationConfig } from "./config.js";
export {
  DEFAULT_HOME_PROBE_INTERVAL_MS,
  DEFAULT_HOME_RETURN_DELAY_MS,
  DEFAULT_MAX_HOME_PROBES,
  DEFAULT_MAX_POWER_CYCLES,
  DEFAULT_POWER_CYCLE_INTERVAL_MS,
  DEFAULT_RELAUNCH_SETTLE_MS,
  DEFAULT_ROTATION_INTERVAL_MS,
  DEFAULT_ROTATION_STEP_DELAY_MS,
  DEFAULT_SCREEN_OFF_MS,
  HOME_PROBE_DIRECTORY,
  HOME_PROBE_TRIGGERS,
  PACKAGE_NAME,
  POWER_CYCLE_TRIGGERS,
  ROTATION_TRIGGERS,
} from "./constants.js";
export {
  type CoordinatorDependencies,
  type HandleEventResult,
  PerturbationCoordinator,
} from "./coordinator.js";
export { HomeProbeAction, type HomeProbeActionOptions, type ProbeCamera, type ProbeStep } from "./home-probe.js";
export { PowerCycleAction, type PowerCycleActionOptions } from "./power-cycle.js";
export { RotationAction, type RotationActionOptions, type RotationStep } from "./rotation.js";
export { PerturbationTask, type PerturbationTaskOptions } from "./task.js";
export type {
  ActionContext,
  HomeProbeConfig,
  HomeReturn,
  HomeReturnSink,
  OfferOutcome,
  Pausable,
  PerturbationAction,
  PerturbationConfig,
  PowerCycleConfig,
  ResolvedPerturbationConfig,
  RotationConfig,
  SkipReason,
  TaskState,
  TaskStats,
} from "./types.js";
