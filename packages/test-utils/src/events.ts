/**
 * Event fixtures in the exploration driver's on-disk layout.
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { EventKind, EventPayload, EventRecord } from "@droidprobe/core";

export function eventRecord(kind: EventKind, id = `event_${kind}.json`): EventRecord {
  return { id, kind, payload: { event: { event_type: kind } } };
}

export function driverEventJson(eventType: string, view?: Readonly<Record<string, unknown>>): EventPayload {
  return {
    tag: "2024-01-01_000000",
    event: { event_type: eventType, ...(view !== undefined ? { view } : {}) },
  };
}

export async function writeEventFile(
  directory: string,
  name: string,
  eventType: string,
  view?: Readonly<Record<string, unknown>>,
): Promise<string> {
  const path = join(directory, name);
  await writeFile(path, JSON.stringify(driverEventJson(eventType, view), null, 2));
  return path;
}
