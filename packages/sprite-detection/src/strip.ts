import type { FrameCandidate } from './types';
import type { FrameCountRange } from './grid';
import { makeCandidate } from './grid';
import {
  COMMON_SPRITE_SIZES,
  STRIP_ASPECT_THRESHOLD,
  STRIP_MAX_FRAME_SIZE,
  STRIP_MAX_FRAMES,
  STRIP_MIN_FRAME_SIZE,
  STRIP_MIN_FRAMES,
} from './constants';

export type StripOrientation = 'horizontal' | 'vertical' | null;

export function stripOrientation(
  width: number,
  height: number,
  threshold: number = STRIP_ASPECT_THRESHOLD
): StripOrientation {
  if (width / height > threshold) return 'horizontal';
  if (height / width > threshold) return 'vertical';
  return null;
}

/**
 * Frame splits along the long axis of a strip: `[frameLength, count]` pairs.
 * `long` is the strip's length, `short` its thickness.
 */
function stripSplits(long: number, short: number): Array<[number, number]> {
  const splits: Array<[number, number]> = [];

  // Division method: equal splits of the long axis
  for (let n = STRIP_MIN_FRAMES; n <= STRIP_MAX_FRAMES; n++) {
    if (long % n !== 0) continue;
    const size = long / n;
    if (size >= STRIP_MIN_FRAME_SIZE && size <= STRIP_MAX_FRAME_SIZE) {
      splits.push([size, n]);
    }
  }

  // Common-size method
  for (const size of COMMON_SPRITE_SIZES) {
    if (size > short || size > long) continue;
    const n = Math.floor(long / size);
    if (n >= 2) splits.push([size, n]);
  }

  return splits;
}

/**
 * Propose single-row (or single-column) layouts for sheets whose aspect ratio
 * exceeds `threshold`. Frames span the full thickness of the strip.
 */
export function generateStripCandidates(
  width: number,
  height: number,
  range: FrameCountRange,
  threshold: number = STRIP_ASPECT_THRESHOLD
): FrameCandidate[] {
  const orientation = stripOrientation(width, height, threshold);
  if (!orientation) return [];

  const inRange = (n: number) => n >= range.minFrames && n <= range.maxFrames;

  if (orientation === 'horizontal') {
    return stripSplits(width, height)
      .filter(([, n]) => inRange(n))
      .map(([size, n]) => makeCandidate(size, height, n, 1, 'horizontal-strip', width, height));
  }

  return stripSplits(height, width)
    .filter(([, n]) => inRange(n))
    .map(([size, n]) => makeCandidate(width, size, 1, n, 'vertical-strip', width, height));
}
