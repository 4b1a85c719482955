/**
 * Driver events as read from the exploration driver's `events/` directory.
 */

export const EVENT_KINDS = [
  "touch",
  "long_touch",
  "set_text",
  "spawn",
  "scroll",
  "swipe",
  "key",
  "manual",
  "exit",
  "intent",
  "select",
  "unselect",
  "kill_app",
  "unknown",
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

/** Decoded JSON object of an event file. */
export type EventPayload = Readonly<Record<string, unknown>>;

export interface EventRecord {
  /** Event file name, unique within a session and sortable by time. */
  readonly id: string;
  readonly kind: EventKind;
  readonly payload: EventPayload;
}

const KIND_SET: ReadonlySet<string> = new Set(EVENT_KINDS);

export function isEventKind(value: unknown): value is EventKind {
  return typeof value === "string" && KIND_SET.has(value);
}

/**
 * Map a raw event-type string to a known kind, `unknown` otherwise.
 */
export function toEventKind(value: unknown): EventKind {
  return isEventKind(value) ? value : "unknown";
}
