import {
  fingerprint,
  loadImage,
  type PerceptualHash,
  type RgbaImage,
} from "@droidprobe/vision";

export interface SnapshotInit {
  readonly capturedAt: number;
  readonly wallClock: string;
  readonly imagePath: string;
  readonly activity: string | null;
  readonly viewTree: string | null;
}

export interface SnapshotJSON {
  readonly capturedAt: number;
  readonly wallClock: string;
  readonly imagePath: string;
  readonly activity: string | null;
  readonly hasViewTree: boolean;
}

/**
 * One persisted screen capture. The decoded image and the fingerprint are
 * loaded from disk on first use and memoized.
 */
export class Snapshot {
  readonly capturedAt: number;
  readonly wallClock: string;
  readonly imagePath: string;
  readonly activity: string | null;
  readonly viewTree: string | null;
  private _image: Promise<RgbaImage> | undefined;
  private _fingerprint: Promise<PerceptualHash> | undefined;

  constructor(init: SnapshotInit) {
    this.capturedAt = init.capturedAt;
    this.wallClock = init.wallClock;
    this.imagePath = init.imagePath;
    this.activity = init.activity;
    this.viewTree = init.viewTree;
  }

  image(): Promise<RgbaImage> {
    this._image ??= loadImage(this.imagePath);
    return this._image;
  }

  fingerprint(): Promise<PerceptualHash> {
    this._fingerprint ??= this.image().then((image) => fingerprint(image));
    return this._fingerprint;
  }

  toJSON(): SnapshotJSON {
    return {
      capturedAt: this.capturedAt,
      wallClock: this.wallClock,
      imagePath: this.imagePath,
      activity: this.activity,
      hasViewTree: this.viewTree !== null,
    };
  }
}
