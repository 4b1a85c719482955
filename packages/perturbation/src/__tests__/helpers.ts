import type { AppInfo, Clock } from "@droidprobe/core";
import { type CaptureResult, Snapshot } from "@droidprobe/device";
import { CaptureFailedError } from "@droidprobe/errors";
import type { ProbeCamera } from "../home-probe.js";

export const APP: AppInfo = {
  packageName: "com.example.notes",
  mainActivity: "MainActivity",
  activities: [],
};

/**
 * Clock whose `now` only moves when told to; timers are real so that
 * zero-length waits complete on their own.
 */
export function steppedClock(start = 1_000): { clock: Clock; advance: (ms: number) => void } {
  let time = start;
  return {
    clock: {
      now: () => time,
      setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
      clearTimeout: (id) => globalThis.clearTimeout(id),
    },
    advance: (ms) => {
      time += ms;
    },
  };
}

export class FakeCamera implements ProbeCamera {
  readonly paths: string[] = [];
  failOn: string | undefined;

  async captureToFile(path: string): Promise<CaptureResult> {
    this.paths.push(path);
    if (this.failOn !== undefined && path.endsWith(this.failOn)) {
      return { ok: false, failure: new CaptureFailedError(3, ["exec-out-screencap: offline"]) };
    }
    return {
      ok: true,
      snapshot: new Snapshot({
        capturedAt: 0,
        wallClock: new Date(0).toISOString(),
        imagePath: path,
        activity: null,
        viewTree: null,
      }),
    };
  }
}
