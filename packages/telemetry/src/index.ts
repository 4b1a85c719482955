export { getIncidentCounter, getPerturbationCounter, getSnapshotCounter } from "./metrics.js";
export { TRACER_NAME, withSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue } from "./types.js";
