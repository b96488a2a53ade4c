import type { FrameCandidate } from './types';
import type { SheetSampler } from './sampler';
import type { FrameCountRange } from './grid';
import { MAX_FRAME_SPACING, PERIOD_TOLERANCE_PX } from './constants';

/** Foreground occupancy of one axis, 1 = some foreground in that column/row */
export type Profile = Uint8Array;

export interface AxisLayout {
  /** Frame size along the axis */
  size: number;
  /** Gutter between frames */
  spacing: number;
  /** Frames along the axis */
  count: number;
}

export interface AxisFit {
  offset: number;
  spacing: number;
  count: number;
}

/** Occupied runs along one axis, half-open */
export type Run = [number, number];

export interface ProfileSummary {
  /** First and one-past-last occupied index */
  start: number;
  end: number;
  runs: Run[];
}

export function summarizeProfile(profile: Profile): ProfileSummary | null {
  const runs: Run[] = [];
  let runStart = -1;
  for (let i = 0; i <= profile.length; i++) {
    const occupied = i < profile.length && profile[i] === 1;
    if (occupied && runStart < 0) runStart = i;
    if (!occupied && runStart >= 0) {
      runs.push([runStart, i]);
      runStart = -1;
    }
  }
  if (runs.length === 0) return null;
  return { start: runs[0][0], end: runs[runs.length - 1][1], runs };
}

// ============================================================================
// Period
// ============================================================================

function near(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance;
}

/**
 * Smallest shift that maps every occupied run onto another run, within
 * `tolerance` px at both ends. Runs shifted past the foreground extent are
 * not checked. Null when the content does not repeat.
 */
export function contentPeriod(summary: ProfileSummary, tolerance = PERIOD_TOLERANCE_PX): number | null {
  const { runs, end } = summary;
  for (let j = 1; j < runs.length; j++) {
    const period = runs[j][0] - runs[0][0];
    const repeats = runs.every(([a, b]) => {
      if (a + period >= end) return true;
      return runs.some(([c, d]) => near(c, a + period, tolerance) && near(d, b + period, tolerance));
    });
    if (repeats) return period;
  }
  return null;
}

// ============================================================================
// Offsets
// ============================================================================

/**
 * Smallest offset at which the frames cover all foreground on this axis
 * without a seam through a sprite. With spacing, every gutter must be empty.
 * Returns null when no such offset exists.
 */
export function alignAxis(profile: Profile, summary: ProfileSummary, layout: AxisLayout): number | null {
  const { size, spacing, count } = layout;
  const pitch = size + spacing;
  const span = count * pitch - spacing;
  const maxOffset = profile.length - span;

  for (let o = 0; o <= maxOffset; o++) {
    if (o > summary.start || o + span < summary.end) continue;

    let ok = true;
    for (let k = 1; k < count && ok; k++) {
      const b = o + k * pitch;
      if (spacing === 0) {
        if (profile[b - 1] && profile[b]) ok = false;
      } else {
        for (let i = b - spacing; i < b; i++) {
          if (profile[i]) {
            ok = false;
            break;
          }
        }
      }
    }
    if (ok) return o;
  }

  return null;
}

/** Spacing values to try, closest pitch to the period first */
function spacingOrder(size: number, period: number): number[] {
  const out: number[] = [];
  for (let s = 0; s <= MAX_FRAME_SPACING; s++) {
    if (near(size + s, period, PERIOD_TOLERANCE_PX)) out.push(s);
  }
  return out.sort((a, b) => Math.abs(size + a - period) - Math.abs(size + b - period) || a - b);
}

/**
 * Fit frames of `size` onto one axis. When the content repeats, the frame
 * pitch (size plus spacing) must match the period; the frame count follows
 * from the pitch.
 */
export function fitAxis(
  profile: Profile,
  summary: ProfileSummary,
  size: number,
  count: number,
  period: number | null
): AxisFit | null {
  if (period === null) {
    const offset = alignAxis(profile, summary, { size, spacing: 0, count });
    return offset === null ? null : { offset, spacing: 0, count };
  }

  for (const spacing of spacingOrder(size, period)) {
    const n = Math.floor((profile.length + spacing) / (size + spacing));
    if (n < 1) continue;
    const offset = alignAxis(profile, summary, { size, spacing, count: n });
    if (offset !== null) return { offset, spacing, count: n };
  }
  return null;
}

/**
 * Fit each candidate to the sheet content. Candidates that fit on both axes
 * get their offset, spacing and counts from the content and `aligned: true`;
 * the rest are returned unchanged.
 */
export function alignCandidates(
  candidates: FrameCandidate[],
  sampler: SheetSampler,
  range: FrameCountRange
): FrameCandidate[] {
  const { columns, rows } = sampler.occupancy();
  const colSummary = summarizeProfile(columns);
  const rowSummary = summarizeProfile(rows);
  if (!colSummary || !rowSummary) return candidates;

  const periodX = contentPeriod(colSummary);
  const periodY = contentPeriod(rowSummary);
  const sheetArea = sampler.width * sampler.height;

  return candidates.map(c => {
    const x = fitAxis(columns, colSummary, c.frameWidth, c.cols, periodX);
    if (!x) return c;
    const y = fitAxis(rows, rowSummary, c.frameHeight, c.rows, periodY);
    if (!y) return c;

    const totalFrames = x.count * y.count;
    if (totalFrames < range.minFrames || totalFrames > range.maxFrames) return c;

    return {
      ...c,
      offsetX: x.offset,
      offsetY: y.offset,
      spacingX: x.spacing,
      spacingY: y.spacing,
      cols: x.count,
      rows: y.count,
      totalFrames,
      utilization: (totalFrames * c.frameWidth * c.frameHeight) / sheetArea,
      aligned: true,
    };
  });
}
