import { readFile } from 'node:fs/promises';
import { PNG } from 'pngjs';
import type { RawImage } from './types';
import { DetectionError } from './errors';
import { assertValidImage } from './sampler';

// ============================================================================
// PNG decode
// ============================================================================

/**
 * Decode a PNG into RGBA pixels. Palette, greyscale and 16-bit images are
 * expanded to 8-bit RGBA by pngjs.
 */
export function decodePng(buffer: Buffer): RawImage {
  let png: PNG;
  try {
    png = PNG.sync.read(buffer);
  } catch (err) {
    throw new DetectionError('InvalidImage', `Could not decode PNG: ${err instanceof Error ? err.message : String(err)}`, {
      operation: 'decodePng',
      bytes: buffer.length,
    });
  }

  const img: RawImage = {
    data: new Uint8ClampedArray(png.data),
    width: png.width,
    height: png.height,
  };
  assertValidImage(img);
  return img;
}

export async function loadPng(path: string): Promise<RawImage> {
  const buffer = await readFile(path);
  return decodePng(buffer);
}

export function encodePng(img: RawImage): Buffer {
  const png = new PNG({ width: img.width, height: img.height });
  png.data = Buffer.from(img.data.buffer, img.data.byteOffset, img.data.byteLength);
  return PNG.sync.write(png);
}

// ============================================================================
// Cropping
// ============================================================================

/** Copy a rectangle out of an image; the rectangle is clipped to the image */
export function crop(img: RawImage, x: number, y: number, width: number, height: number): RawImage {
  const x0 = Math.max(0, x);
  const y0 = Math.max(0, y);
  const x1 = Math.min(img.width, x + width);
  const y1 = Math.min(img.height, y + height);
  const w = Math.max(0, x1 - x0);
  const h = Math.max(0, y1 - y0);
  const data = new Uint8ClampedArray(w * h * 4);

  for (let row = 0; row < h; row++) {
    const src = ((y0 + row) * img.width + x0) * 4;
    data.set(img.data.subarray(src, src + w * 4), row * w * 4);
  }
  return { data, width: w, height: h };
}
