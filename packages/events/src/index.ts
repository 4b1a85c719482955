export { eventType, eventView, parseEventFile } from "./parse.js";
export { EventStreamReader, type EventStreamReaderOptions } from "./reader.js";
