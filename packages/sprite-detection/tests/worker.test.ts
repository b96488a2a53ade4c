import { EventEmitter } from 'node:events';
import { afterEach, beforeEach, describe, test, expect, vi } from 'vitest';
import { DetectionWorker, type WorkerPort } from '../src/workers/DetectionWorker';
import { handleRequest, type WorkerRequest } from '../src/workers/detection.worker';
import { DetectionError } from '../src/errors';
import { logger } from '../src/logger';
import { createMarginGridFixture, createSheet, fillRect } from './fixtures';

/**
 * Runs the worker's message handler on the test thread. Responses are
 * delivered on a later tick, like a real worker's.
 */
class InProcessPort extends EventEmitter implements WorkerPort {
  readonly sent: WorkerRequest[] = [];
  readonly transfers: ArrayBuffer[][] = [];
  terminated = false;
  /** When false, requests are held until `flush()` */
  autoReply = true;

  postMessage(value: WorkerRequest, transferList: ArrayBuffer[] = []): void {
    this.sent.push(value);
    this.transfers.push(transferList);
    if (this.autoReply) setImmediate(() => this.reply(value));
  }

  async terminate(): Promise<number> {
    this.terminated = true;
    return 0;
  }

  flush(): void {
    for (const msg of this.sent) this.reply(msg);
  }

  fail(err: Error): void {
    this.emit('error', err);
  }

  exit(exitCode: number): void {
    this.emit('exit', exitCode);
  }

  private reply(msg: WorkerRequest): void {
    this.emit('message', handleRequest(msg));
  }
}

function copyBuffer(data: Uint8ClampedArray): ArrayBuffer {
  const copy = new ArrayBuffer(data.byteLength);
  new Uint8ClampedArray(copy).set(data);
  return copy;
}

describe('handleRequest', () => {
  test('answers grid requests with the detection result', () => {
    const img = createMarginGridFixture();
    const response = handleRequest({
      type: 'detectGrid',
      id: 7,
      imgBuffer: copyBuffer(img.data),
      width: img.width,
      height: img.height,
      config: {},
    });
    expect(response.id).toBe(7);
    expect(response.error).toBeUndefined();
    expect(response.result && !Array.isArray(response.result) && response.result.autoPick.frameWidth).toBe(64);
  });

  test('reports engine errors by code', () => {
    const response = handleRequest({
      type: 'detectIrregular',
      id: 3,
      imgBuffer: new ArrayBuffer(12),
      width: 2,
      height: 2,
      config: {},
    });
    expect(response.id).toBe(3);
    expect(response.error?.code).toBe('InvalidImage');
    expect(response.result).toBeUndefined();
  });
});

describe('DetectionWorker', () => {
  let port: InProcessPort;
  let worker: DetectionWorker;

  beforeEach(() => {
    logger.setWriter(() => {});
    port = new InProcessPort();
    worker = new DetectionWorker(() => port);
  });

  afterEach(async () => {
    await worker.dispose();
    logger.setWriter(undefined);
  });

  test('detectGrid resolves with the ranked result', async () => {
    const img = createMarginGridFixture();
    const result = await worker.detectGrid(img.data, img.width, img.height);
    expect(result.autoPick).toMatchObject({ frameWidth: 64, frameHeight: 64, cols: 3, rows: 2 });
  });

  test('detectIrregular resolves with the clusters', async () => {
    const img = fillRect(createSheet(40, 30), { x: 10, y: 8, width: 20, height: 14 });
    const clusters = await worker.detectIrregular(img.data, img.width, img.height);
    expect(clusters).toEqual([{ box: { x0: 10, y0: 8, x1: 30, y1: 22 }, memberCount: 1, area: 280 }]);
  });

  test('the caller keeps its pixels; a copy is transferred', async () => {
    const img = createMarginGridFixture();
    await worker.detectGrid(img.data, img.width, img.height);
    expect(img.data.byteLength).toBe(208 * 144 * 4);
    expect(port.transfers[0][0]).not.toBe(img.data.buffer);
    expect(port.transfers[0][0]).toBe(port.sent[0].imgBuffer);
  });

  test('engine errors are rebuilt as DetectionError', async () => {
    const img = createSheet(7, 7);
    const pending = worker.detectGrid(img.data, img.width, img.height);
    await expect(pending).rejects.toBeInstanceOf(DetectionError);
    await expect(pending).rejects.toMatchObject({ code: 'NoCandidatesFound' });
  });

  test('cancelAll rejects pending requests and ignores late answers', async () => {
    port.autoReply = false;
    const img = createMarginGridFixture();
    const pending = worker.detectGrid(img.data, img.width, img.height);
    expect(worker.pendingCount).toBe(1);

    worker.cancelAll();
    await expect(pending).rejects.toThrow('Cancelled');
    expect(worker.pendingCount).toBe(0);

    // The answer still arrives but nobody is waiting for it
    expect(() => port.flush()).not.toThrow();
  });

  test('a crashed worker rejects everything pending', async () => {
    port.autoReply = false;
    const img = createMarginGridFixture();
    const pending = worker.detectIrregular(img.data, img.width, img.height);
    port.fail(new Error('worker exited'));
    await expect(pending).rejects.toThrow('worker exited');
  });

  test('a thread that exits rejects everything pending', async () => {
    port.autoReply = false;
    const img = createMarginGridFixture();
    const first = worker.detectGrid(img.data, img.width, img.height);
    const second = worker.detectIrregular(img.data, img.width, img.height);
    port.exit(1);
    await expect(first).rejects.toThrow('Detection worker exited with code 1');
    await expect(second).rejects.toThrow('Detection worker exited with code 1');
    expect(worker.pendingCount).toBe(0);
  });

  test('an exit with nothing pending is ignored', async () => {
    port.exit(0);
    const img = fillRect(createSheet(40, 30), { x: 10, y: 8, width: 20, height: 14 });
    await expect(worker.detectIrregular(img.data, img.width, img.height)).resolves.toHaveLength(1);
  });

  test('dispose terminates the thread', async () => {
    port.autoReply = false;
    const img = createMarginGridFixture();
    const pending = worker.detectGrid(img.data, img.width, img.height);
    const rejected = expect(pending).rejects.toThrow('Worker disposed');
    await worker.dispose();
    await rejected;
    expect(port.terminated).toBe(true);
  });

  test('request ids increase per call', async () => {
    const img = createMarginGridFixture();
    await Promise.all([
      worker.detectGrid(img.data, img.width, img.height),
      worker.detectIrregular(img.data, img.width, img.height),
    ]);
    expect(port.sent.map(m => [m.id, m.type])).toEqual([
      [1, 'detectGrid'],
      [2, 'detectIrregular'],
    ]);
  });

  test('spies see the posted config', async () => {
    const spy = vi.spyOn(port, 'postMessage');
    const img = createMarginGridFixture();
    await worker.detectGrid(img.data, img.width, img.height, { maxFrames: 50 });
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatchObject({ type: 'detectGrid', config: { maxFrames: 50 } });
  });
});
