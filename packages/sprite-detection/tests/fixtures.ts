/**
 * Synthetic sprite sheet generation for tests.
 * Everything is built in memory as RGBA; no image files are read.
 */

import type { RawImage } from '../src/types';

export type Color = [number, number, number, number];

export const OPAQUE_RED: Color = [220, 40, 40, 255];
export const TRANSPARENT: Color = [0, 0, 0, 0];

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Blank sheet filled with one color (transparent by default) */
export function createSheet(width: number, height: number, fill: Color = TRANSPARENT): RawImage {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data.set(fill, i * 4);
  }
  return { data, width, height };
}

/** Paint an axis-aligned rectangle in place */
export function fillRect(img: RawImage, rect: Rect, color: Color = OPAQUE_RED): RawImage {
  for (let y = rect.y; y < rect.y + rect.height; y++) {
    for (let x = rect.x; x < rect.x + rect.width; x++) {
      img.data.set(color, (y * img.width + x) * 4);
    }
  }
  return img;
}

export interface GridSheetOptions {
  cols: number;
  rows: number;
  /** Cell size */
  frame: number;
  /** Transparent border around the whole grid */
  margin: number;
  /** Transparent inset of each sprite inside its cell */
  inset: number;
  /** Gutter between cells */
  spacing?: number;
  background?: Color;
  sprite?: Color;
}

/**
 * Sheet of `cols × rows` cells of `frame` pixels surrounded by `margin`,
 * each cell holding one solid sprite inset from the cell edges.
 */
export function createGridSheet(opts: GridSheetOptions): RawImage {
  const { cols, rows, frame, margin, inset, spacing = 0, background = TRANSPARENT, sprite = OPAQUE_RED } = opts;
  const pitch = frame + spacing;
  const img = createSheet(cols * pitch - spacing + 2 * margin, rows * pitch - spacing + 2 * margin, background);
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      fillRect(
        img,
        {
          x: margin + c * pitch + inset,
          y: margin + r * pitch + inset,
          width: frame - 2 * inset,
          height: frame - 2 * inset,
        },
        sprite
      );
    }
  }
  return img;
}

/**
 * The known-good fixture: 3×2 cells of 64×64 with an 8 px outer margin
 * (208×144), each holding a 48×48 sprite inset 8 px.
 */
export function createMarginGridFixture(): RawImage {
  return createGridSheet({ cols: 3, rows: 2, frame: 64, margin: 8, inset: 8 });
}

/**
 * 3×2 cells of 32×32 with a 4 px gutter and a 6 px outer margin (116×80),
 * each holding a 24×24 sprite.
 */
export function createSpacedGridFixture(): RawImage {
  return createGridSheet({ cols: 3, rows: 2, frame: 32, margin: 6, inset: 4, spacing: 4 });
}

/**
 * 4×2 cells of 64×64 (256×128). Each sprite is a body at x+8..30 and a
 * detached weapon at x+40..56, both spanning y+8..56.
 */
export function createTwoPartSpriteFixture(): RawImage {
  const img = createSheet(256, 128);
  for (let r = 0; r < 2; r++) {
    for (let c = 0; c < 4; c++) {
      fillRect(img, { x: c * 64 + 8, y: r * 64 + 8, width: 22, height: 48 });
      fillRect(img, { x: c * 64 + 40, y: r * 64 + 8, width: 16, height: 48 }, [90, 90, 200, 255]);
    }
  }
  return img;
}
