import type { FrameCandidate } from './types';
import {
  ASPECT_RATIOS,
  COMMON_SPRITE_SIZES,
  EXCESSIVE_FRAME_COUNT,
  MAX_FRAME_SIZE,
  MAX_REASONABLE_FRAMES,
  MIN_FRAME_SIZE,
  MIN_REASONABLE_FRAMES,
  OPTIMAL_FRAME_COUNT_MAX,
  OPTIMAL_FRAME_COUNT_MIN,
} from './constants';

// ============================================================================
// Weight table
// ============================================================================

/**
 * Points awarded per rule. Rules are applied additively in declaration order.
 *
 * The strip frame-count tiers and the small `stripSquareFrame` bonus keep a
 * single large square frame from outscoring the correct many-frame split on
 * wide strips: on 1920×320, 160×320×12 must beat 320×320×6.
 */
export const SCORE_WEIGHTS = Object.freeze({
  reasonableFrameCount: 100,
  optimalFrameCount: 30,
  /** Maximum penalty; actual is min(50, (total - 50) * 2) */
  excessiveFrameCount: -50,
  dimensionMatch: 100,
  swappedDimensionMatch: 80,
  divisibleDimensions: 60,
  reasonableFrameSize: 60,
  powerOfTwo: 20,
  commonSpriteSize: 30,
  stripLayout: 80,
  stripIdealFrameCount: 60,
  stripGoodFrameCount: 40,
  stripFairFrameCount: 20,
  stripSquareFrame: 30,
  canonicalAspect: 40,
  squareAspect: 25,
  stripSingleRow: 60,
  stripFewRows: 30,
  compactGrid: 40,
  multiRowGrid: 20,
  denseGridPenalty: -30,
  cleanDivision: 80,
} as const satisfies Record<string, number>);

export type ScoreRule = keyof typeof SCORE_WEIGHTS;

export interface ScoreContribution {
  rule: ScoreRule;
  points: number;
}

// ============================================================================
// Helpers
// ============================================================================

function gcd(a: number, b: number): number {
  while (b !== 0) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

const commonSizes: ReadonlySet<number> = new Set(COMMON_SPRITE_SIZES);

function isCanonicalRatio(w: number, h: number): boolean {
  const d = gcd(w, h);
  const rw = w / d;
  const rh = h / d;
  return ASPECT_RATIOS.some(([a, b]) => a === rw && b === rh);
}

/** Vertical strips are scored as the equivalent horizontal strip */
function normalize(
  c: FrameCandidate,
  sheetWidth: number,
  sheetHeight: number
): { c: FrameCandidate; width: number; height: number } {
  if (c.kind !== 'vertical-strip') return { c, width: sheetWidth, height: sheetHeight };
  return {
    c: {
      ...c,
      frameWidth: c.frameHeight,
      frameHeight: c.frameWidth,
      offsetX: c.offsetY,
      offsetY: c.offsetX,
      spacingX: c.spacingY,
      spacingY: c.spacingX,
      cols: c.rows,
      rows: c.cols,
      kind: 'horizontal-strip',
    },
    width: sheetHeight,
    height: sheetWidth,
  };
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * List the rules that fire for a candidate, in table order, with the points
 * each contributes.
 */
export function explainScore(
  candidate: FrameCandidate,
  sheetWidth: number,
  sheetHeight: number
): ScoreContribution[] {
  const { c, width, height } = normalize(candidate, sheetWidth, sheetHeight);
  const fw = c.frameWidth;
  const fh = c.frameHeight;
  const total = c.totalFrames;
  const isStrip = c.kind !== 'grid';
  const availW = width - c.offsetX;
  const availH = height - c.offsetY;

  const out: ScoreContribution[] = [];
  const add = (rule: ScoreRule, points: number = SCORE_WEIGHTS[rule]) => {
    out.push({ rule, points });
  };

  // Frame count
  if (total >= MIN_REASONABLE_FRAMES && total <= MAX_REASONABLE_FRAMES) add('reasonableFrameCount');
  if (total >= OPTIMAL_FRAME_COUNT_MIN && total <= OPTIMAL_FRAME_COUNT_MAX) add('optimalFrameCount');
  if (total > EXCESSIVE_FRAME_COUNT && !isStrip) {
    add(
      'excessiveFrameCount',
      -Math.min(-SCORE_WEIGHTS.excessiveFrameCount, (total - EXCESSIVE_FRAME_COUNT) * 2)
    );
  }

  // Dimension fit
  if (fw === availW || fh === availH) add('dimensionMatch');
  else if (fw === availH || fh === availW) add('swappedDimensionMatch');
  if (availW % fw === 0 && availH % fh === 0) add('divisibleDimensions');

  // Frame size
  if (fw >= MIN_FRAME_SIZE && fw <= MAX_FRAME_SIZE && fh >= MIN_FRAME_SIZE && fh <= MAX_FRAME_SIZE) {
    add('reasonableFrameSize');
    if (isPowerOfTwo(fw) && isPowerOfTwo(fh)) add('powerOfTwo');
    if (commonSizes.has(fw) || commonSizes.has(fh)) add('commonSpriteSize');
  }

  // Strip bonuses
  if (isStrip) {
    add('stripLayout');
    if (total >= 8 && total <= 16) add('stripIdealFrameCount');
    else if (total >= 6 && total <= 24) add('stripGoodFrameCount');
    else if (total >= 4 && total <= 32) add('stripFairFrameCount');
    if (fw === fh && fh === availH) add('stripSquareFrame');
  }

  // Aspect ratio
  if (isCanonicalRatio(fw, fh)) add('canonicalAspect');
  else if (fw === fh) add('squareAspect');

  // Layout shape
  const cols = Math.floor(availW / fw);
  const rows = Math.floor(availH / fh);
  if (isStrip) {
    if (rows === 1) add('stripSingleRow');
    else if (rows <= 3) add('stripFewRows');
  } else {
    if (cols >= 2 && cols <= 8 && rows >= 2 && rows <= 8) add('compactGrid');
    else if (cols >= 2 && rows >= 2) add('multiRowGrid');
    if (cols > 10 && rows > 10) add('denseGridPenalty');
  }

  if (availW % fw === 0 && availH % fh === 0) add('cleanDivision');

  return out;
}

/** Integer plausibility score; pure and deterministic */
export function scoreCandidate(candidate: FrameCandidate, sheetWidth: number, sheetHeight: number): number {
  return explainScore(candidate, sheetWidth, sheetHeight).reduce((sum, c) => sum + c.points, 0);
}
