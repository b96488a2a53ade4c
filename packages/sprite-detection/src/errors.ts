/**
 * Error kinds raised by the detection engine. Every failure is recoverable at
 * the call site; nothing here terminates the process.
 */

export type DetectionErrorCode =
  | 'InvalidImage'
  | 'NoCandidatesFound'
  | 'NoForegroundDetected'
  | 'InvalidConfiguration';

export const DETECTION_ERROR_CODES: readonly DetectionErrorCode[] = [
  'InvalidImage',
  'NoCandidatesFound',
  'NoForegroundDetected',
  'InvalidConfiguration',
];

/**
 * Context information for debugging
 */
export interface ErrorContext {
  operation?: string;
  width?: number;
  height?: number;
  [key: string]: unknown;
}

export class DetectionError extends Error {
  public readonly code: DetectionErrorCode;
  public readonly context: ErrorContext;

  constructor(code: DetectionErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'DetectionError';
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DetectionError);
    }
  }

  toJSON(): { code: DetectionErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export function isDetectionErrorCode(value: unknown): value is DetectionErrorCode {
  return DETECTION_ERROR_CODES.some(code => code === value);
}

export function isDetectionError(err: unknown): err is DetectionError {
  return err instanceof DetectionError;
}

/**
 * Format an error for terminal output.
 */
export function formatError(err: unknown): string {
  if (err instanceof DetectionError) return `[${err.code}] ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
