// ============================================================================
// spritecut – public API
// ============================================================================

export type {
  RawImage,
  Rgba,
  SpriteSheet,
  LayoutKind,
  FrameCandidate,
  BoundingBox,
  Component,
  SpriteCluster,
  BackgroundKey,
  GridDetectionResult,
  IrregularDetectionResult,
  DetectionResult,
  FrameRect,
} from './types';

import type {
  FrameCandidate,
  GridDetectionResult,
  DetectionResult,
  RawImage,
  SpriteCluster,
} from './types';
import {
  resolveGridConfig,
  resolveIrregularConfig,
  type GridConfigInput,
  type IrregularConfigInput,
} from './config';
import { DetectionError } from './errors';
import { logger } from './logger';
import { SheetSampler } from './sampler';
import { generateGridCandidates } from './grid';
import { generateStripCandidates } from './strip';
import { alignCandidates } from './alignment';
import { scoreCandidate } from './scoring';
import { findSpriteClusters } from './labeling';

export { SheetSampler, detectBackgroundKey, assertValidImage } from './sampler';
export { generateGridCandidates } from './grid';
export { generateStripCandidates, stripOrientation } from './strip';
export { alignCandidates, contentPeriod } from './alignment';
export { SCORE_WEIGHTS, scoreCandidate, explainScore } from './scoring';
export type { ScoreRule, ScoreContribution } from './scoring';
export { labelComponents, mergeComponents, orderRowMajor, findSpriteClusters } from './labeling';
export { detectMargins } from './margins';
export type { MarginReport } from './margins';
export { frameRects, checkLayout, summarizeClusters } from './layout';
export type { ClusterSummary, LayoutCheck } from './layout';
export { decodePng, encodePng, loadPng, crop } from './image';
export {
  resolveGridConfig,
  resolveIrregularConfig,
  parseConfigFile,
  assertFrameBounds,
  GridConfigSchema,
  IrregularConfigSchema,
} from './config';
export type { GridConfig, GridConfigInput, IrregularConfig, IrregularConfigInput, ConfigFile } from './config';
export { DetectionError, isDetectionError, formatError } from './errors';
export type { DetectionErrorCode } from './errors';
export { Logger, logger } from './logger';
export type { LogLevel, LogFormat } from './logger';

const log = logger.child('detect');

export type DetectionRequest =
  | { mode: 'grid'; config?: GridConfigInput }
  | { mode: 'irregular'; config?: IrregularConfigInput };

// ============================================================================
// Ranking
// ============================================================================

function geometryKey(c: FrameCandidate): string {
  return `${c.frameWidth}x${c.frameHeight}:${c.cols}x${c.rows}@${c.offsetX},${c.offsetY}+${c.spacingX},${c.spacingY}`;
}

/** Keep the best-scoring candidate per geometry; the earlier one wins ties */
function dedupeByGeometry(candidates: FrameCandidate[]): FrameCandidate[] {
  const best = new Map<string, FrameCandidate>();
  for (const c of candidates) {
    const key = geometryKey(c);
    const existing = best.get(key);
    if (!existing || c.score > existing.score) best.set(key, c);
  }
  return [...best.values()];
}

/** Aligned first, then score desc, utilization desc, fewer frames first */
export function rankCandidates(candidates: FrameCandidate[]): FrameCandidate[] {
  return [...candidates].sort(
    (a, b) =>
      Number(b.aligned) - Number(a.aligned) ||
      b.score - a.score ||
      b.utilization - a.utilization ||
      a.totalFrames - b.totalFrames
  );
}

// ============================================================================
// Entry points
// ============================================================================

/**
 * Propose uniform frame layouts for a sheet and rank them.
 *
 * Grid candidates are always generated; strip candidates only when the
 * sheet's aspect ratio passes `stripAspectThreshold`. Candidates that fit the
 * sheet content are marked `aligned` and rank ahead of the rest. Every
 * candidate is returned, best first, with the top one as `autoPick`.
 */
export function detectGrid(img: RawImage, config: GridConfigInput = {}): GridDetectionResult {
  const cfg = resolveGridConfig(config);
  const sampler = new SheetSampler(img, cfg);
  const { width, height } = sampler;
  const range = { minFrames: cfg.minFrames, maxFrames: cfg.maxFrames };

  const grid = generateGridCandidates(width, height, range);
  const strips = generateStripCandidates(width, height, range, cfg.stripAspectThreshold);
  let candidates = [...grid, ...strips];
  log.debug('Generated candidates', { width, height, grid: grid.length, strip: strips.length });

  if (cfg.alignToContent && candidates.length > 0) {
    candidates = alignCandidates(candidates, sampler, range);
    const aligned = candidates.filter(c => c.aligned).length;
    if (aligned === 0 && sampler.foregroundBounds()) {
      log.warn('No candidate aligns with sheet content; ranking by score alone', { candidates: candidates.length });
    } else {
      log.debug('Aligned candidates to content', { aligned, unaligned: candidates.length - aligned });
    }
  }

  const scored = candidates.map(c => ({ ...c, score: scoreCandidate(c, width, height) }));
  const ranked = rankCandidates(dedupeByGeometry(scored));

  const autoPick = ranked[0];
  if (!autoPick) {
    throw new DetectionError(
      'NoCandidatesFound',
      `No frame layout with ${cfg.minFrames}..${cfg.maxFrames} frames fits a ${width}×${height} sheet`,
      { operation: 'detectGrid', width, height }
    );
  }

  log.debug('Auto pick', {
    frame: `${autoPick.frameWidth}×${autoPick.frameHeight}`,
    layout: `${autoPick.cols}×${autoPick.rows}`,
    spacing: `${autoPick.spacingX},${autoPick.spacingY}`,
    aligned: autoPick.aligned,
    score: autoPick.score,
  });
  return { mode: 'grid', candidates: ranked, autoPick };
}

/**
 * Find individual sprites on a sheet without assuming a grid. Clusters come
 * back in reading order.
 */
export function detectIrregular(img: RawImage, config: IrregularConfigInput = {}): SpriteCluster[] {
  const cfg = resolveIrregularConfig(config);
  const sampler = new SheetSampler(img, cfg);
  const clusters = findSpriteClusters(sampler.backgroundMask(), sampler.width, sampler.height, cfg);

  if (clusters.length === 0) {
    throw new DetectionError('NoForegroundDetected', 'No sprites found on the sheet', {
      operation: 'detectIrregular',
      width: sampler.width,
      height: sampler.height,
      background: sampler.key.kind,
    });
  }

  log.debug('Found sprite clusters', { clusters: clusters.length, background: sampler.key.kind });
  return clusters;
}

/** Run the requested mode and wrap its output in a `DetectionResult` */
export function detectSprites(img: RawImage, request: DetectionRequest): DetectionResult {
  switch (request.mode) {
    case 'grid':
      return detectGrid(img, request.config);
    case 'irregular': {
      const clusters = detectIrregular(img, request.config);
      return { mode: 'irregular', clusters, autoPick: clusters };
    }
  }
}
