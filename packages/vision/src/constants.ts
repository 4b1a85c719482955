export const DEFAULT_HASH_SIZE = 8;

/** Per-pixel intensity difference (0-255) above which a pixel counts as changed. */
export const DEFAULT_PIXEL_THRESHOLD = 30;

/** Fraction of changed pixels above which two screenshots differ significantly. */
export const DEFAULT_AREA_FRACTION_THRESHOLD = 0.15;

/** Largest change ratio at which a rotated screenshot still counts as the same screen. */
export const DEFAULT_ROTATION_THRESHOLD = 0.05;

export const ROTATIONS = [90, 180, 270] as const;
