/**
 * @droidprobe/core
 *
 * Types and small runtime utilities shared by every droidprobe package.
 */

export { type Clock, defaultClock, isAbortError, sleep, type TimerHandle } from "./clock.js";
export type { AppInfo, CommandResult, DeviceTransport, ExecuteOptions } from "./device-types.js";
export {
  EVENT_KINDS,
  type EventKind,
  type EventPayload,
  type EventRecord,
  isEventKind,
  toEventKind,
} from "./event-types.js";
export {
  type ConsoleLoggerOptions,
  createConsoleLogger,
  type LogFields,
  type Logger,
  type LogLevel,
  silentLogger,
} from "./logger.js";
export { RingBuffer } from "./ring-buffer.js";
export { compactTimestamp, padSequence } from "./time.js";
