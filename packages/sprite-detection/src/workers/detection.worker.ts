/**
 * Worker thread for sprite detection – keeps labeling and candidate search
 * off the caller's event loop.
 */
import { parentPort, workerData } from 'node:worker_threads';
import { detectGrid, detectIrregular } from '../index';
import type { GridConfigInput, IrregularConfigInput } from '../config';
import type { GridDetectionResult, RawImage, SpriteCluster } from '../types';
import { isDetectionError, type DetectionErrorCode } from '../errors';

// ── Message protocol ────────────────────────────────────────────────────────

export type WorkerRequest =
  | {
      type: 'detectGrid';
      id: number;
      imgBuffer: ArrayBuffer;
      width: number;
      height: number;
      config: GridConfigInput;
    }
  | {
      type: 'detectIrregular';
      id: number;
      imgBuffer: ArrayBuffer;
      width: number;
      height: number;
      config: IrregularConfigInput;
    };

export type WorkerResult = GridDetectionResult | SpriteCluster[];

export interface WorkerError {
  /** Detection error code, or 'Internal' for anything unexpected */
  code: DetectionErrorCode | 'Internal';
  message: string;
}

export interface WorkerResponse {
  id: number;
  result?: WorkerResult;
  error?: WorkerError;
}

// ── Handler ──────────────────────────────────────────────────────────────────

function toRawImage(buffer: ArrayBuffer, width: number, height: number): RawImage {
  return { data: new Uint8ClampedArray(buffer), width, height };
}

export function handleRequest(msg: WorkerRequest): WorkerResponse {
  try {
    const img = toRawImage(msg.imgBuffer, msg.width, msg.height);
    switch (msg.type) {
      case 'detectGrid':
        return { id: msg.id, result: detectGrid(img, msg.config) };
      case 'detectIrregular':
        return { id: msg.id, result: detectIrregular(img, msg.config) };
    }
  } catch (err) {
    if (isDetectionError(err)) {
      return { id: msg.id, error: err.toJSON() };
    }
    return {
      id: msg.id,
      error: { code: 'Internal', message: err instanceof Error ? err.message : String(err) },
    };
  }
}

/** Passed as `workerData` so the handler only attaches in threads we started */
export const WORKER_MARKER = 'spritecut-detection';

if (parentPort && workerData === WORKER_MARKER) {
  const port = parentPort;
  port.on('message', (msg: WorkerRequest) => {
    port.postMessage(handleRequest(msg) satisfies WorkerResponse);
  });
}
