import type { FrameCandidate } from './types';
import { ASPECT_RATIOS, BASE_SIZES } from './constants';

export interface FrameCountRange {
  minFrames: number;
  maxFrames: number;
}

/** Candidate with score left at 0, no offset or spacing, not yet aligned */
export function makeCandidate(
  frameWidth: number,
  frameHeight: number,
  cols: number,
  rows: number,
  kind: FrameCandidate['kind'],
  sheetWidth: number,
  sheetHeight: number
): FrameCandidate {
  return {
    frameWidth,
    frameHeight,
    offsetX: 0,
    offsetY: 0,
    spacingX: 0,
    spacingY: 0,
    cols,
    rows,
    totalFrames: cols * rows,
    kind,
    score: 0,
    utilization: (cols * frameWidth * rows * frameHeight) / (sheetWidth * sheetHeight),
    aligned: false,
  };
}

/**
 * Enumerate uniform grids from the base size × aspect ratio table.
 *
 * Order is deterministic: base size ascending, then ratios in table order.
 * Repeated geometries keep their first occurrence.
 */
export function generateGridCandidates(
  width: number,
  height: number,
  range: FrameCountRange
): FrameCandidate[] {
  const out: FrameCandidate[] = [];
  const seen = new Set<string>();

  for (const base of BASE_SIZES) {
    for (const [rw, rh] of ASPECT_RATIOS) {
      const fw = base * rw;
      const fh = base * rh;
      if (fw > width || fh > height) continue;

      const cols = Math.floor(width / fw);
      const rows = Math.floor(height / fh);
      const total = cols * rows;
      if (total < range.minFrames || total > range.maxFrames) continue;

      const key = `${fw}x${fh}:${cols}x${rows}`;
      if (seen.has(key)) continue;
      seen.add(key);

      out.push(makeCandidate(fw, fh, cols, rows, 'grid', width, height));
    }
  }

  return out;
}
