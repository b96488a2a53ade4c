import { z, type ZodIssue } from 'zod';
import {
  ALPHA_THRESHOLD,
  COLOR_TOLERANCE,
  MAX_FRAME_DIMENSION,
  MAX_REASONABLE_FRAMES,
  MERGE_PROXIMITY_PX,
  MIN_REASONABLE_FRAMES,
  NOISE_AREA_THRESHOLD,
  STRIP_ASPECT_THRESHOLD,
} from './constants';
import { DetectionError } from './errors';

// ============================================================================
// Schemas
// ============================================================================

const backgroundShape = {
  /** Pixels with alpha at or below this are background */
  alphaThreshold: z
    .number()
    .int('alphaThreshold must be an integer')
    .min(0, 'alphaThreshold cannot be negative')
    .max(254, 'alphaThreshold must be below 255')
    .default(ALPHA_THRESHOLD),
  /** Per-channel distance to the color key that still counts as background */
  colorTolerance: z
    .number()
    .int('colorTolerance must be an integer')
    .min(0, 'colorTolerance cannot be negative')
    .max(255, 'colorTolerance cannot exceed 255')
    .default(COLOR_TOLERANCE),
};

export const GridConfigSchema = z
  .object({
    minFrames: z
      .number()
      .int('minFrames must be an integer')
      .min(1, 'minFrames must be at least 1')
      .default(MIN_REASONABLE_FRAMES),
    maxFrames: z
      .number()
      .int('maxFrames must be an integer')
      .min(1, 'maxFrames must be at least 1')
      .default(MAX_REASONABLE_FRAMES),
    stripAspectThreshold: z
      .number()
      .finite()
      .min(1, 'stripAspectThreshold must be at least 1')
      .default(STRIP_ASPECT_THRESHOLD),
    /** Fit offsets and spacing to the sheet content and rank aligned candidates first */
    alignToContent: z.boolean().default(true),
    ...backgroundShape,
  })
  .strict()
  .refine(cfg => cfg.minFrames <= cfg.maxFrames, {
    message: 'minFrames cannot exceed maxFrames',
    path: ['minFrames'],
  });

export const IrregularConfigSchema = z
  .object({
    /** Components with fewer pixels are discarded as noise */
    noiseAreaThreshold: z
      .number()
      .int('noiseAreaThreshold must be an integer')
      .min(0, 'noiseAreaThreshold cannot be negative')
      .default(NOISE_AREA_THRESHOLD),
    /** Largest gap in pixels between boxes that are merged into one sprite */
    mergeProximityPx: z
      .number()
      .int('mergeProximityPx must be an integer')
      .min(0, 'mergeProximityPx cannot be negative')
      .default(MERGE_PROXIMITY_PX),
    ...backgroundShape,
  })
  .strict();

/** Config file accepted by the CLI */
export const ConfigFileSchema = z
  .object({
    grid: z.record(z.unknown()).optional(),
    irregular: z.record(z.unknown()).optional(),
  })
  .strict();

export type GridConfig = z.output<typeof GridConfigSchema>;
export type GridConfigInput = z.input<typeof GridConfigSchema>;
export type IrregularConfig = z.output<typeof IrregularConfigSchema>;
export type IrregularConfigInput = z.input<typeof IrregularConfigSchema>;
export type BackgroundConfig = Pick<GridConfig, 'alphaThreshold' | 'colorTolerance'>;

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function invalid(what: string, issues: ZodIssue[]): DetectionError {
  return new DetectionError('InvalidConfiguration', `Invalid ${what}: ${formatIssues(issues)}`, {
    operation: 'parseConfig',
    issues: issues.map(i => ({ path: i.path.join('.'), message: i.message })),
  });
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw invalid(what, parsed.error.issues);
  return parsed.data;
}

export function resolveGridConfig(input: GridConfigInput = {}): GridConfig {
  return parseWith(GridConfigSchema, input, 'grid configuration');
}

export function resolveIrregularConfig(input: IrregularConfigInput = {}): IrregularConfig {
  return parseWith(IrregularConfigSchema, input, 'irregular configuration');
}

export interface ConfigFile {
  grid: GridConfig;
  irregular: IrregularConfig;
}

/**
 * Validate the parsed contents of a JSON config file. Both sections are
 * optional and fall back to defaults.
 */
export function parseConfigFile(raw: unknown): ConfigFile {
  const file = parseWith(ConfigFileSchema, raw, 'config file');
  return {
    grid: parseWith(GridConfigSchema, file.grid ?? {}, 'grid configuration'),
    irregular: parseWith(IrregularConfigSchema, file.irregular ?? {}, 'irregular configuration'),
  };
}

/**
 * Bounds check a caller-entered frame size before running grid mode.
 */
export function assertFrameBounds(frameWidth: number, frameHeight: number): void {
  for (const [name, value] of [
    ['frameWidth', frameWidth],
    ['frameHeight', frameHeight],
  ] as const) {
    if (!Number.isInteger(value) || value <= 0 || value > MAX_FRAME_DIMENSION) {
      throw new DetectionError(
        'InvalidConfiguration',
        `${name} must be an integer in 1..${MAX_FRAME_DIMENSION}, got ${value}`,
        { operation: 'assertFrameBounds' }
      );
    }
  }
}
