import { type EventPayload, type EventRecord, toEventKind } from "@droidprobe/core";
import { getErrorMessage, ValidationError } from "@droidprobe/errors";

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The driver nests the event under `event`; older dumps put `event_type`
 * at the top level.
 */
export function eventType(payload: EventPayload): unknown {
  const nested = payload["event"];
  if (isRecord(nested) && "event_type" in nested) return nested["event_type"];
  return payload["event_type"];
}

/**
 * The `view` object of an event, when it targets one.
 */
export function eventView(payload: EventPayload): Readonly<Record<string, unknown>> | null {
  const nested = payload["event"];
  if (!isRecord(nested)) return null;
  const view = nested["view"];
  return isRecord(view) ? view : null;
}

/**
 * @throws {ValidationError} when the text is not a JSON object
 */
export function parseEventFile(text: string, id: string): EventRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Event file ${id} is not valid JSON: ${getErrorMessage(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`Event file ${id} does not contain a JSON object`);
  }
  return { id, kind: toEventKind(eventType(parsed)), payload: parsed };
}
