/**
 * Typed wrapper around the detection worker thread.
 * Manages worker lifecycle and provides a promise-based API.
 */
import { join } from 'node:path';
import { Worker } from 'node:worker_threads';
import type { GridConfigInput, IrregularConfigInput } from '../config';
import type { GridDetectionResult, SpriteCluster } from '../types';
import { DetectionError } from '../errors';
import { logger } from '../logger';
import {
  WORKER_MARKER,
  type WorkerError,
  type WorkerRequest,
  type WorkerResponse,
  type WorkerResult,
} from './detection.worker';

const log = logger.child('worker');

/** The slice of `worker_threads.Worker` the wrapper relies on */
export interface WorkerPort {
  postMessage(value: WorkerRequest, transferList?: ArrayBuffer[]): void;
  on(event: 'message', listener: (response: WorkerResponse) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'exit', listener: (exitCode: number) => void): unknown;
  terminate(): Promise<unknown>;
}

export type WorkerFactory = () => WorkerPort;

type Pending = {
  resolve: (value: WorkerResult) => void;
  reject: (reason: Error) => void;
};

/** Runs the compiled worker next to this file (dist/workers/detection.worker.js) */
function spawnWorker(): WorkerPort {
  return new Worker(join(__dirname, 'detection.worker.js'), { workerData: WORKER_MARKER });
}

function toError(error: WorkerError): Error {
  if (error.code === 'Internal') return new Error(error.message);
  return new DetectionError(error.code, error.message, { operation: 'worker' });
}

function isGridResult(r: WorkerResult): r is GridDetectionResult {
  return !Array.isArray(r);
}

function isClusterList(r: WorkerResult): r is SpriteCluster[] {
  return Array.isArray(r);
}

export class DetectionWorker {
  private worker: WorkerPort;
  private nextId = 1;
  private pending = new Map<number, Pending>();

  constructor(factory: WorkerFactory = spawnWorker) {
    this.worker = factory();
    this.worker.on('message', (response: WorkerResponse) => {
      const { id, result, error } = response;
      const p = this.pending.get(id);
      // Cancelled or unknown request: the answer is discarded
      if (!p) return;
      this.pending.delete(id);
      if (error) {
        p.reject(toError(error));
      } else if (result) {
        p.resolve(result);
      } else {
        p.reject(new Error(`Worker sent an empty response for request ${id}`));
      }
    });
    this.worker.on('error', (err: Error) => {
      log.error('Detection worker failed', { error: err.message, pending: this.pending.size });
      this.rejectAll(err);
    });
    // A thread that stops without an 'error' would leave callers waiting
    this.worker.on('exit', (exitCode: number) => {
      if (this.pending.size === 0) return;
      log.error('Detection worker exited', { exitCode, pending: this.pending.size });
      this.rejectAll(new Error(`Detection worker exited with code ${exitCode}`));
    });
  }

  /** Requests still waiting for an answer */
  get pendingCount(): number {
    return this.pending.size;
  }

  detectGrid(
    imgData: Uint8ClampedArray,
    width: number,
    height: number,
    config: GridConfigInput = {}
  ): Promise<GridDetectionResult> {
    return this.request(
      id => ({ type: 'detectGrid', id, imgBuffer: copyPixels(imgData), width, height, config }),
      isGridResult
    );
  }

  detectIrregular(
    imgData: Uint8ClampedArray,
    width: number,
    height: number,
    config: IrregularConfigInput = {}
  ): Promise<SpriteCluster[]> {
    return this.request(
      id => ({ type: 'detectIrregular', id, imgBuffer: copyPixels(imgData), width, height, config }),
      isClusterList
    );
  }

  /** Reject every pending request; answers that arrive later are ignored. */
  cancelAll(): void {
    this.rejectAll(new Error('Cancelled'));
  }

  /** Cancel all pending requests and terminate the worker. */
  async dispose(): Promise<void> {
    this.rejectAll(new Error('Worker disposed'));
    await this.worker.terminate();
  }

  private request<T extends WorkerResult>(
    build: (id: number) => WorkerRequest,
    accept: (r: WorkerResult) => r is T
  ): Promise<T> {
    const id = this.nextId++;
    const msg = build(id);
    return new Promise<T>((resolve, reject) => {
      this.pending.set(id, {
        resolve: r => (accept(r) ? resolve(r) : reject(new Error(`Unexpected result for ${msg.type}`))),
        reject,
      });
      this.worker.postMessage(msg, [msg.imgBuffer]);
    });
  }

  private rejectAll(reason: Error): void {
    for (const p of this.pending.values()) {
      p.reject(reason);
    }
    this.pending.clear();
  }
}

/** Copy the pixels so the buffer can be transferred without detaching the caller's */
function copyPixels(data: Uint8ClampedArray): ArrayBuffer {
  const copy = new ArrayBuffer(data.byteLength);
  new Uint8ClampedArray(copy).set(data);
  return copy;
}
