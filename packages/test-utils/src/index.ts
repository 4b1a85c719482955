export { type TestClock, type ScheduledTimer, createTestClock } from "./clock.js";
export { driverEventJson, eventRecord, writeEventFile } from "./events.js";
export { createImage, encodePng, type Rgb, screenWithBlock, solidImage, writePng } from "./images.js";
export { createTempDir, type TempDir } from "./temp-dir.js";
export {
  type FakeCall,
  type FakeHandler,
  type FakeMatcher,
  type FakeResponse,
  FakeTransport,
  hangUntilAborted,
} from "./transport.js";
