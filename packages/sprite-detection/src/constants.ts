// ============================================================================
// Search space and fixed thresholds
// ============================================================================

/** Base frame sizes tried by the grid generator, ascending */
export const BASE_SIZES = [8, 12, 16, 20, 24, 32, 40, 48, 64, 80, 96, 128, 160, 192, 256] as const;

/** Canonical frame aspect ratios as [w, h] */
export const ASPECT_RATIOS: ReadonlyArray<readonly [number, number]> = [
  [1, 1],
  [1, 2],
  [2, 1],
  [2, 3],
  [3, 2],
  [3, 4],
  [4, 3],
];

/** Frame sizes artists commonly use */
export const COMMON_SPRITE_SIZES = [16, 24, 32, 48, 64, 96, 128, 160, 192, 256] as const;

export const MIN_REASONABLE_FRAMES = 2;
export const MAX_REASONABLE_FRAMES = 200;

export const OPTIMAL_FRAME_COUNT_MIN = 4;
export const OPTIMAL_FRAME_COUNT_MAX = 32;

/** Frame count above which dense non-strip grids are penalised */
export const EXCESSIVE_FRAME_COUNT = 50;

export const MIN_FRAME_SIZE = 8;
export const MAX_FRAME_SIZE = 512;

// Strip search
export const STRIP_ASPECT_THRESHOLD = 3.0;
export const STRIP_MIN_FRAMES = 2;
export const STRIP_MAX_FRAMES = 20;
export const STRIP_MIN_FRAME_SIZE = 16;
export const STRIP_MAX_FRAME_SIZE = 512;

// Background detection
export const ALPHA_THRESHOLD = 10;
export const COLOR_TOLERANCE = 15;
/** Share of opaque pixels above which a sheet is treated as color-keyed */
export const COLOR_KEY_OPAQUE_RATIO = 0.95;
export const OPAQUE_ALPHA = 128;

// Content alignment
/** Widest gutter between frames that is searched for */
export const MAX_FRAME_SPACING = 10;
/** Slack when matching repeated content runs and frame pitch */
export const PERIOD_TOLERANCE_PX = 2;

// Connected components
export const NOISE_AREA_THRESHOLD = 8;
export const MERGE_PROXIMITY_PX = 2;

/** Upper bound for manually entered frame dimensions */
export const MAX_FRAME_DIMENSION = 2048;
