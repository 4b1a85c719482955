export {
  analyzeCrashes,
  CRASH_REPORT_FILE,
  type CrashAnalysisOptions,
  type CrashEntry,
  type CrashReport,
  DEFAULT_CRASH_SIMILARITY_THRESHOLD,
  detectCrashes,
  saveCrashReport,
} from "./crash.js";
export { directoryExists, listFiles, rate, writeJsonReport } from "./files.js";
export {
  analyzeHomeProbeLoss,
  DEFAULT_HOME_PROBE_THRESHOLD,
  HOME_PROBE_DIRECTORY,
  HOME_PROBE_REPORT_FILE,
  type HomeProbeAction,
  type HomeProbeAnalysisOptions,
  type HomeProbeLossReport,
  saveHomeProbeLossReport,
} from "./home-probe-loss.js";
export {
  analyzeStateLoss,
  DEFAULT_STATE_HASH_THRESHOLD,
  type DisappearedDialog,
  type EditTextChange,
  type HashMismatch,
  saveStateLossReport,
  STATE_LOSS_REPORT_FILE,
  type StateLossOptions,
  type StateLossReport,
} from "./state-loss.js";
