// ============================================================================
// Core types for sprite sheet frame detection
// ============================================================================

/** Raw RGBA image, row-major, 4 bytes per pixel */
export interface RawImage {
  data: Uint8ClampedArray;
  width: number;
  height: number;
}

/** An RGBA pixel */
export type Rgba = [number, number, number, number];

/** Read-only view of a sheet; the engine only borrows it for one pass. */
export interface SpriteSheet {
  readonly width: number;
  readonly height: number;
  pixel(x: number, y: number): Rgba;
}

/**
 * How a frame layout was proposed. Strips on tall sheets are
 * `'vertical-strip'` (one column) rather than a transposed horizontal strip.
 */
export type LayoutKind = 'grid' | 'horizontal-strip' | 'vertical-strip';

/** A proposed uniform frame layout */
export interface FrameCandidate {
  frameWidth: number;
  frameHeight: number;
  offsetX: number; // left margin
  offsetY: number; // top margin
  spacingX: number;
  spacingY: number;
  cols: number;
  rows: number;
  totalFrames: number;
  kind: LayoutKind;
  score: number;
  /** Fraction of the sheet area covered by the tiled frames, in [0, 1] */
  utilization: number;
  /** Seams fall between sprites and the frame pitch matches repeated content */
  aligned: boolean;
}

/** Axis-aligned box; x1 and y1 are exclusive */
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/** One connected foreground region */
export interface Component {
  label: number;
  box: BoundingBox;
  area: number;
}

/** Components merged into one logical sprite */
export interface SpriteCluster {
  box: BoundingBox;
  memberCount: number;
  area: number;
}

/** How background pixels are recognised */
export type BackgroundKey =
  | { kind: 'alpha'; alphaThreshold: number }
  | {
      kind: 'color';
      alphaThreshold: number;
      color: [number, number, number];
      tolerance: number;
    };

export interface GridDetectionResult {
  mode: 'grid';
  /** Ranked best-first */
  candidates: FrameCandidate[];
  autoPick: FrameCandidate;
}

export interface IrregularDetectionResult {
  mode: 'irregular';
  /** Row-major */
  clusters: SpriteCluster[];
  /** The whole cluster list, accepted as one layout */
  autoPick: SpriteCluster[];
}

export type DetectionResult = GridDetectionResult | IrregularDetectionResult;

/** Frame rectangle in sheet coordinates */
export interface FrameRect {
  index: number;
  x: number;
  y: number;
  width: number;
  height: number;
}
