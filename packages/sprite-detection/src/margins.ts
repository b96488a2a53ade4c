import type { SheetSampler } from './sampler';
import { STRIP_ASPECT_THRESHOLD } from './constants';

export interface MarginReport {
  /** Raw transparent margins measured from each edge */
  left: number;
  right: number;
  top: number;
  bottom: number;
  /** Validated offsets to use as the layout's top-left margin */
  offsetX: number;
  offsetY: number;
  /** Size of the area between the raw margins */
  contentWidth: number;
  contentHeight: number;
  notes: string[];
}

/** Margins at or below this are treated as noise */
const NOISE_MARGIN = 2;
/** Cap on margins for wide strip sheets */
const STRIP_MARGIN_CAP = 5;

/**
 * Measure transparent margins around the sheet's content and validate them.
 *
 * Pass a frame size to pull the margins back until the remaining width and
 * height divide cleanly by it.
 */
export function detectMargins(
  sampler: SheetSampler,
  frame?: { width: number; height: number }
): MarginReport {
  const { width, height } = sampler;
  const bounds = sampler.foregroundBounds();
  const notes: string[] = [];

  if (!bounds) {
    notes.push('Sheet has no foreground; margins left at 0');
    return {
      left: 0,
      right: 0,
      top: 0,
      bottom: 0,
      offsetX: 0,
      offsetY: 0,
      contentWidth: width,
      contentHeight: height,
      notes,
    };
  }

  const left = bounds.x0;
  const top = bounds.y0;
  const right = width - bounds.x1;
  const bottom = height - bounds.y1;

  let offsetX = left;
  let offsetY = top;

  const maxX = Math.floor(width / 4);
  const maxY = Math.floor(height / 4);
  if (offsetX > maxX) {
    notes.push(`Left margin ${offsetX}px excessive (>${maxX}px), reset to 0`);
    offsetX = 0;
  }
  if (offsetY > maxY) {
    notes.push(`Top margin ${offsetY}px excessive (>${maxY}px), reset to 0`);
    offsetY = 0;
  }

  if (frame && frame.width > 0 && frame.height > 0) {
    if ((width - offsetX) % frame.width !== 0) {
      for (let reduced = offsetX - 1; reduced >= 0; reduced--) {
        if ((width - reduced) % frame.width === 0) {
          notes.push(`Adjusted left margin to ${reduced} for clean frame division`);
          offsetX = reduced;
          break;
        }
      }
    }
    if ((height - offsetY) % frame.height !== 0) {
      for (let reduced = offsetY - 1; reduced >= 0; reduced--) {
        if ((height - reduced) % frame.height === 0) {
          notes.push(`Adjusted top margin to ${reduced} for clean frame division`);
          offsetY = reduced;
          break;
        }
      }
    }
  }

  if (width / height > STRIP_ASPECT_THRESHOLD) {
    if (offsetX > STRIP_MARGIN_CAP) {
      offsetX = STRIP_MARGIN_CAP;
      notes.push('Reduced left margin for horizontal strip');
    }
    if (offsetY > STRIP_MARGIN_CAP) {
      offsetY = STRIP_MARGIN_CAP;
      notes.push('Reduced top margin for horizontal strip');
    }
  }

  if (offsetX <= NOISE_MARGIN) offsetX = 0;
  if (offsetY <= NOISE_MARGIN) offsetY = 0;

  return {
    left,
    right,
    top,
    bottom,
    offsetX,
    offsetY,
    contentWidth: bounds.x1 - bounds.x0,
    contentHeight: bounds.y1 - bounds.y0,
    notes,
  };
}
