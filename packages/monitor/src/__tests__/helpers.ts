import { join } from "node:path";
import { compactTimestamp, type EventRecord } from "@droidprobe/core";
import { type CaptureResult, Snapshot } from "@droidprobe/device";
import { CaptureFailedError } from "@droidprobe/errors";
import { createImage, solidImage, writePng } from "@droidprobe/test-utils";
import type { RgbaImage } from "@droidprobe/vision";
import type { EventSource, SnapshotSource } from "../types.js";

export const LAUNCHER: RgbaImage = createImage(16, 16, (x) => (x < 8 ? 255 : 0));
export const BLANK: RgbaImage = solidImage(16, 16, 0);

/** Portrait screen with a block in the top-left corner. */
export const PORTRAIT: RgbaImage = createImage(16, 24, (x, y) => (x < 4 && y < 6 ? 255 : 0));
/** {@link PORTRAIT} turned a quarter clockwise. */
export const LANDSCAPE: RgbaImage = createImage(24, 16, (x, y) => (x >= 18 && y < 4 ? 255 : 0));

export type Frame =
  | { readonly image: RgbaImage; readonly activity: string | null }
  | { readonly fail: string };

/**
 * Serves queued frames as snapshots written to `directory`.
 */
export class FakeSampler implements SnapshotSource {
  readonly frames: Frame[] = [];
  /** Signals passed to `capture`, in call order. */
  readonly signals: (AbortSignal | undefined)[] = [];
  onCapture: (() => void) | undefined;
  /** Make every capture wait for its signal to abort. */
  hang = false;
  private sequence = 0;

  constructor(
    private readonly directory: string,
    private readonly now: () => number,
  ) {}

  queue(...frames: Frame[]): this {
    this.frames.push(...frames);
    return this;
  }

  async capture(signal?: AbortSignal): Promise<CaptureResult> {
    this.signals.push(signal);
    this.onCapture?.();
    if (this.hang) {
      await new Promise<void>((resolve) => {
        if (signal?.aborted) resolve();
        signal?.addEventListener("abort", () => resolve(), { once: true });
      });
      return { ok: false, failure: new CaptureFailedError(1, ["fake: aborted"]) };
    }
    const frame = this.frames.shift();
    if (frame === undefined) {
      return { ok: false, failure: new CaptureFailedError(1, ["fake: no frame queued"]) };
    }
    if ("fail" in frame) {
      return { ok: false, failure: new CaptureFailedError(1, [frame.fail]) };
    }
    this.sequence++;
    const capturedAt = this.now();
    const imagePath = join(this.directory, `snapshot_${compactTimestamp(capturedAt)}_${this.sequence}.png`);
    await writePng(imagePath, frame.image);
    return {
      ok: true,
      snapshot: new Snapshot({
        capturedAt,
        wallClock: new Date(capturedAt).toISOString(),
        imagePath,
        activity: frame.activity,
        viewTree: null,
      }),
    };
  }
}

export class FakeEvents implements EventSource {
  readonly batches: (readonly EventRecord[] | Error)[] = [];

  async poll(): Promise<readonly EventRecord[]> {
    const batch = this.batches.shift() ?? [];
    if (batch instanceof Error) throw batch;
    return batch;
  }
}
