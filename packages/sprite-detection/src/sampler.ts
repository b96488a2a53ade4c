import type { BackgroundKey, BoundingBox, RawImage, Rgba, SpriteSheet } from './types';
import type { BackgroundConfig } from './config';
import { ALPHA_THRESHOLD, COLOR_KEY_OPAQUE_RATIO, COLOR_TOLERANCE, OPAQUE_ALPHA } from './constants';
import { DetectionError } from './errors';

// ============================================================================
// Image validation
// ============================================================================

export function assertValidImage(img: RawImage): void {
  const { data, width, height } = img;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new DetectionError('InvalidImage', `Image has invalid dimensions ${width}×${height}`, {
      operation: 'sample',
      width,
      height,
    });
  }
  if (data.length !== width * height * 4) {
    throw new DetectionError(
      'InvalidImage',
      `Pixel buffer holds ${data.length} bytes, expected ${width * height * 4} for ${width}×${height} RGBA`,
      { operation: 'sample', width, height }
    );
  }
}

// ============================================================================
// Background key detection
// ============================================================================

/**
 * Decide how background pixels are recognised.
 *
 * Sheets where more than 95% of pixels are opaque are treated as color-keyed:
 * the key is the most frequent corner color (top-left wins ties). Otherwise
 * transparency alone separates sprites from background.
 */
export function detectBackgroundKey(
  img: RawImage,
  opts: Partial<BackgroundConfig> = {}
): BackgroundKey {
  const { alphaThreshold = ALPHA_THRESHOLD, colorTolerance = COLOR_TOLERANCE } = opts;
  const { data, width, height } = img;
  const total = width * height;

  let opaque = 0;
  for (let i = 0; i < total; i++) {
    if (data[i * 4 + 3] > OPAQUE_ALPHA) opaque++;
  }
  if (opaque / total <= COLOR_KEY_OPAQUE_RATIO) {
    return { kind: 'alpha', alphaThreshold };
  }

  const corners: Array<[number, number]> = [
    [0, 0],
    [width - 1, 0],
    [0, height - 1],
    [width - 1, height - 1],
  ];
  const counts = new Map<string, { color: [number, number, number]; count: number }>();
  for (const [x, y] of corners) {
    const i = (y * width + x) * 4;
    const color: [number, number, number] = [data[i], data[i + 1], data[i + 2]];
    const key = color.join(',');
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { color, count: 1 });
  }

  // Map iteration follows insertion order, so the first corner wins ties
  let best: { color: [number, number, number]; count: number } | undefined;
  for (const entry of counts.values()) {
    if (!best || entry.count > best.count) best = entry;
  }
  if (!best) return { kind: 'alpha', alphaThreshold };

  return { kind: 'color', alphaThreshold, color: best.color, tolerance: colorTolerance };
}

// ============================================================================
// SheetSampler
// ============================================================================

/**
 * Read-only pixel access plus the background/foreground split every detector
 * works from. The mask is computed once on construction.
 */
export class SheetSampler implements SpriteSheet {
  readonly width: number;
  readonly height: number;
  readonly key: BackgroundKey;
  private readonly data: Uint8ClampedArray;
  /** 1 = background, 0 = foreground */
  private readonly mask: Uint8Array;
  private bounds: BoundingBox | null | undefined;

  constructor(img: RawImage, opts: Partial<BackgroundConfig> = {}) {
    assertValidImage(img);
    this.width = img.width;
    this.height = img.height;
    this.data = img.data;
    this.key = detectBackgroundKey(img, opts);
    this.mask = this.buildMask();
  }

  dimensions(): [number, number] {
    return [this.width, this.height];
  }

  pixel(x: number, y: number): Rgba {
    const i = (y * this.width + x) * 4;
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }

  isBackground(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return true;
    return this.mask[y * this.width + x] === 1;
  }

  /** Copy of the background mask (1 = background) */
  backgroundMask(): Uint8Array {
    return this.mask.slice();
  }

  foregroundCount(): number {
    let count = 0;
    for (let i = 0; i < this.mask.length; i++) if (this.mask[i] === 0) count++;
    return count;
  }

  /** Tight box around all foreground pixels, or null for an empty sheet */
  foregroundBounds(): BoundingBox | null {
    if (this.bounds !== undefined) return this.bounds;

    let x0 = this.width;
    let y0 = this.height;
    let x1 = 0;
    let y1 = 0;
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.mask[y * this.width + x]) continue;
        if (x < x0) x0 = x;
        if (y < y0) y0 = y;
        if (x + 1 > x1) x1 = x + 1;
        if (y + 1 > y1) y1 = y + 1;
      }
    }
    this.bounds = x1 > x0 && y1 > y0 ? { x0, y0, x1, y1 } : null;
    return this.bounds;
  }

  /**
   * Per-column and per-row foreground occupancy (1 when any pixel in that
   * column/row is foreground).
   */
  occupancy(): { columns: Uint8Array; rows: Uint8Array } {
    const columns = new Uint8Array(this.width);
    const rows = new Uint8Array(this.height);
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.mask[y * this.width + x] === 0) {
          columns[x] = 1;
          rows[y] = 1;
        }
      }
    }
    return { columns, rows };
  }

  private buildMask(): Uint8Array {
    const { data, width, height, key } = this;
    const mask = new Uint8Array(width * height);
    for (let i = 0; i < width * height; i++) {
      const a = data[i * 4 + 3];
      if (a <= key.alphaThreshold) {
        mask[i] = 1;
        continue;
      }
      if (key.kind === 'color') {
        const [kr, kg, kb] = key.color;
        const t = key.tolerance;
        if (
          Math.abs(data[i * 4] - kr) <= t &&
          Math.abs(data[i * 4 + 1] - kg) <= t &&
          Math.abs(data[i * 4 + 2] - kb) <= t
        ) {
          mask[i] = 1;
        }
      }
    }
    return mask;
  }
}
