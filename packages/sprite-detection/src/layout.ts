import type { FrameCandidate, FrameRect, SpriteCluster } from './types';

/**
 * Frame rectangles of a candidate in row-major order, honouring offset and
 * spacing. This is what an exporter crops.
 */
export function frameRects(c: FrameCandidate): FrameRect[] {
  const rects: FrameRect[] = [];
  for (let row = 0; row < c.rows; row++) {
    for (let col = 0; col < c.cols; col++) {
      rects.push({
        index: row * c.cols + col,
        x: c.offsetX + col * (c.frameWidth + c.spacingX),
        y: c.offsetY + row * (c.frameHeight + c.spacingY),
        width: c.frameWidth,
        height: c.frameHeight,
      });
    }
  }
  return rects;
}

export interface LayoutCheck {
  ok: boolean;
  problems: string[];
}

/** Check that a candidate tiles inside the sheet and its counts agree */
export function checkLayout(
  c: FrameCandidate,
  sheetWidth: number,
  sheetHeight: number,
  range?: { minFrames: number; maxFrames: number }
): LayoutCheck {
  const problems: string[] = [];

  if (c.frameWidth <= 0 || c.frameHeight <= 0) problems.push('frame size must be positive');
  if (c.cols <= 0 || c.rows <= 0) problems.push('cols and rows must be positive');
  if (c.cols * c.rows !== c.totalFrames) {
    problems.push(`cols*rows = ${c.cols * c.rows} but totalFrames = ${c.totalFrames}`);
  }

  const right = c.offsetX + c.cols * c.frameWidth + (c.cols - 1) * c.spacingX;
  const bottom = c.offsetY + c.rows * c.frameHeight + (c.rows - 1) * c.spacingY;
  if (right > sheetWidth) problems.push(`layout extends to x=${right}, sheet is ${sheetWidth} wide`);
  if (bottom > sheetHeight) problems.push(`layout extends to y=${bottom}, sheet is ${sheetHeight} high`);

  if (range && (c.totalFrames < range.minFrames || c.totalFrames > range.maxFrames)) {
    problems.push(`totalFrames ${c.totalFrames} outside ${range.minFrames}..${range.maxFrames}`);
  }
  if (c.utilization < 0 || c.utilization > 1) problems.push(`utilization ${c.utilization} outside [0, 1]`);

  return { ok: problems.length === 0, problems };
}

// ============================================================================
// Cluster summary
// ============================================================================

/** Spread in pixels below which cluster sizes count as uniform */
const UNIFORM_SPREAD_PX = 8;
/** Cluster centres closer than this share a row or column */
const CENTER_GROUP_PX = 15;

export interface ClusterSummary {
  count: number;
  medianWidth: number;
  medianHeight: number;
  uniform: boolean;
  cols: number;
  rows: number;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function countGroups(values: number[], tolerance: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  let groups = 0;
  let anchor = -Infinity;
  for (const v of sorted) {
    if (v - anchor > tolerance) {
      groups++;
      anchor = v;
    }
  }
  return groups;
}

/**
 * Infer a uniform layout from irregular clusters: typical sprite size and how
 * many distinct columns and rows their centres fall into.
 */
export function summarizeClusters(clusters: SpriteCluster[]): ClusterSummary | null {
  if (clusters.length === 0) return null;

  const widths = clusters.map(c => c.box.x1 - c.box.x0);
  const heights = clusters.map(c => c.box.y1 - c.box.y0);
  const spread = (v: number[]) => Math.max(...v) - Math.min(...v);

  return {
    count: clusters.length,
    medianWidth: median(widths),
    medianHeight: median(heights),
    uniform: spread(widths) < UNIFORM_SPREAD_PX && spread(heights) < UNIFORM_SPREAD_PX,
    cols: countGroups(
      clusters.map(c => (c.box.x0 + c.box.x1) / 2),
      CENTER_GROUP_PX
    ),
    rows: countGroups(
      clusters.map(c => (c.box.y0 + c.box.y1) / 2),
      CENTER_GROUP_PX
    ),
  };
}
