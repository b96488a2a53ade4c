import { describe, test, expect } from 'vitest';
import {
  assertFrameBounds,
  parseConfigFile,
  resolveGridConfig,
  resolveIrregularConfig,
} from '../src/config';
import { DetectionError, formatError, isDetectionErrorCode } from '../src/errors';

function configError(fn: () => unknown): DetectionError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DetectionError) return err;
    throw err;
  }
  throw new Error('expected a DetectionError');
}

describe('Grid configuration', () => {
  test('defaults', () => {
    expect(resolveGridConfig()).toEqual({
      minFrames: 2,
      maxFrames: 200,
      stripAspectThreshold: 3,
      alignToContent: true,
      alphaThreshold: 10,
      colorTolerance: 15,
    });
  });

  test('negative thresholds are rejected with the zod issue', () => {
    const err = configError(() => resolveGridConfig({ alphaThreshold: -1 }));
    expect(err.code).toBe('InvalidConfiguration');
    expect(err.context.issues).toEqual([{ path: 'alphaThreshold', message: 'alphaThreshold cannot be negative' }]);
  });

  test('minFrames above maxFrames is rejected', () => {
    const err = configError(() => resolveGridConfig({ minFrames: 10, maxFrames: 5 }));
    expect(err.message).toBe('Invalid grid configuration: minFrames: minFrames cannot exceed maxFrames');
  });

  test('fractional frame counts are rejected', () => {
    const err = configError(() => resolveGridConfig({ maxFrames: 2.5 }));
    expect(err.context.issues).toEqual([{ path: 'maxFrames', message: 'maxFrames must be an integer' }]);
  });
});

describe('Irregular configuration', () => {
  test('defaults', () => {
    expect(resolveIrregularConfig()).toEqual({
      noiseAreaThreshold: 8,
      mergeProximityPx: 2,
      alphaThreshold: 10,
      colorTolerance: 15,
    });
  });

  test('negative merge distance is rejected', () => {
    const err = configError(() => resolveIrregularConfig({ mergeProximityPx: -3 }));
    expect(err.context.issues).toEqual([{ path: 'mergeProximityPx', message: 'mergeProximityPx cannot be negative' }]);
  });
});

describe('Config file', () => {
  test('missing sections fall back to defaults', () => {
    const file = parseConfigFile({ grid: { minFrames: 4 } });
    expect(file.grid.minFrames).toBe(4);
    expect(file.grid.maxFrames).toBe(200);
    expect(file.irregular).toEqual(resolveIrregularConfig());
  });

  test('unknown keys are rejected', () => {
    const err = configError(() => parseConfigFile({ grid: { foo: 1 } }));
    expect(err.context.issues).toEqual([{ path: '', message: "Unrecognized key(s) in object: 'foo'" }]);
  });

  test('non-object input is rejected', () => {
    expect(configError(() => parseConfigFile('grid')).code).toBe('InvalidConfiguration');
  });
});

describe('assertFrameBounds', () => {
  test('accepts sizes up to 2048', () => {
    expect(() => assertFrameBounds(1, 2048)).not.toThrow();
  });

  test.each([
    [0, 10],
    [2049, 1],
    [1.5, 2],
    [16, -16],
  ])('rejects %d×%d', (w, h) => {
    expect(configError(() => assertFrameBounds(w, h)).code).toBe('InvalidConfiguration');
  });
});

describe('Errors', () => {
  test('formatError prefixes the code', () => {
    expect(formatError(new DetectionError('InvalidImage', 'bad buffer'))).toBe('[InvalidImage] bad buffer');
    expect(formatError(new Error('plain'))).toBe('plain');
    expect(formatError('text')).toBe('text');
  });

  test('toJSON carries only code and message', () => {
    const err = new DetectionError('NoCandidatesFound', 'none', { width: 3 });
    expect(JSON.parse(JSON.stringify(err))).toEqual({ code: 'NoCandidatesFound', message: 'none' });
  });

  test('isDetectionErrorCode', () => {
    expect(isDetectionErrorCode('NoForegroundDetected')).toBe(true);
    expect(isDetectionErrorCode('Internal')).toBe(false);
  });
});
