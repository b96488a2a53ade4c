#!/usr/bin/env node
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { detectGrid, detectIrregular } from './index';
import { parseConfigFile, type ConfigFile, type GridConfigInput, type IrregularConfigInput } from './config';
import { DetectionError, formatError } from './errors';
import { crop, encodePng, loadPng } from './image';
import { frameRects, summarizeClusters } from './layout';
import { logger } from './logger';
import { explainScore } from './scoring';
import type { FrameCandidate, RawImage, SpriteCluster } from './types';

interface CommonOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  out?: string;
}

interface GridOptions extends CommonOptions {
  minFrames?: number;
  maxFrames?: number;
  stripThreshold?: number;
  align: boolean;
  top: number;
  explain?: boolean;
}

interface IrregularOptions extends CommonOptions {
  noise?: number;
  merge?: number;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

async function loadConfigFile(path: string | undefined): Promise<ConfigFile> {
  if (!path) return parseConfigFile({});
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new DetectionError(
      'InvalidConfiguration',
      `Could not read config file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { operation: 'loadConfigFile' }
    );
  }
  return parseConfigFile(raw);
}

/** Config file values with command-line flags laid over them */
export function gridConfigFromOptions(file: ConfigFile, options: GridOptions): GridConfigInput {
  return {
    ...file.grid,
    ...(options.minFrames !== undefined ? { minFrames: options.minFrames } : {}),
    ...(options.maxFrames !== undefined ? { maxFrames: options.maxFrames } : {}),
    ...(options.stripThreshold !== undefined ? { stripAspectThreshold: options.stripThreshold } : {}),
    ...(options.align ? {} : { alignToContent: false }),
  };
}

export function irregularConfigFromOptions(file: ConfigFile, options: IrregularOptions): IrregularConfigInput {
  return {
    ...file.irregular,
    ...(options.noise !== undefined ? { noiseAreaThreshold: options.noise } : {}),
    ...(options.merge !== undefined ? { mergeProximityPx: options.merge } : {}),
  };
}

// ── Output ──────────────────────────────────────────────────────────────────

export function formatCandidateTable(candidates: FrameCandidate[], top: number): string[] {
  const lines: string[] = [];
  lines.push(
    '#'.padEnd(4) +
      'Frame'.padEnd(12) +
      'Layout'.padEnd(10) +
      'Frames'.padEnd(8) +
      'Offset'.padEnd(10) +
      'Spacing'.padEnd(9) +
      'Kind'.padEnd(18) +
      'Aligned'.padEnd(9) +
      'Util'.padEnd(8) +
      'Score'
  );
  lines.push('-'.repeat(94));
  candidates.slice(0, top).forEach((c, i) => {
    lines.push(
      String(i + 1).padEnd(4) +
        `${c.frameWidth}×${c.frameHeight}`.padEnd(12) +
        `${c.cols}×${c.rows}`.padEnd(10) +
        String(c.totalFrames).padEnd(8) +
        `${c.offsetX},${c.offsetY}`.padEnd(10) +
        `${c.spacingX},${c.spacingY}`.padEnd(9) +
        c.kind.padEnd(18) +
        (c.aligned ? 'yes' : 'no').padEnd(9) +
        c.utilization.toFixed(3).padEnd(8) +
        String(c.score)
    );
  });
  return lines;
}

export function formatClusterTable(clusters: SpriteCluster[]): string[] {
  const lines: string[] = [];
  lines.push('#'.padEnd(5) + 'Box (x0,y0 → x1,y1)'.padEnd(26) + 'Size'.padEnd(12) + 'Parts'.padEnd(7) + 'Area');
  lines.push('-'.repeat(60));
  clusters.forEach((c, i) => {
    const { x0, y0, x1, y1 } = c.box;
    lines.push(
      String(i + 1).padEnd(5) +
        `${x0},${y0} → ${x1},${y1}`.padEnd(26) +
        `${x1 - x0}×${y1 - y0}`.padEnd(12) +
        String(c.memberCount).padEnd(7) +
        String(c.area)
    );
  });
  return lines;
}

async function exportRects(
  img: RawImage,
  rects: Array<{ x: number; y: number; width: number; height: number }>,
  dir: string
): Promise<void> {
  await mkdir(dir, { recursive: true });
  for (const [i, r] of rects.entries()) {
    const name = `frame_${String(i).padStart(3, '0')}.png`;
    await writeFile(join(dir, name), encodePng(crop(img, r.x, r.y, r.width, r.height)));
  }
  console.log(chalk.green(`Wrote ${rects.length} frame(s) to ${dir}`));
}

// ── Commands ────────────────────────────────────────────────────────────────

function applyVerbose(options: CommonOptions): void {
  if (options.verbose) logger.setLevel('debug');
}

async function runGrid(file: string, options: GridOptions): Promise<void> {
  applyVerbose(options);
  const config = gridConfigFromOptions(await loadConfigFile(options.config), options);
  const img = await loadPng(file);
  const result = detectGrid(img, config);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(chalk.bold(`\n${file}: ${img.width}×${img.height}, ${result.candidates.length} candidate(s)\n`));
    for (const line of formatCandidateTable(result.candidates, options.top)) console.log(line);

    const pick = result.autoPick;
    console.log(
      '\n' +
        chalk.green('Auto pick: ') +
        `${pick.frameWidth}×${pick.frameHeight} frames, ${pick.cols}×${pick.rows} at offset ${pick.offsetX},${pick.offsetY}` +
        (pick.spacingX || pick.spacingY ? `, spacing ${pick.spacingX},${pick.spacingY}` : '') +
        (pick.aligned ? '' : chalk.yellow(' (not aligned to content)'))
    );
    if (options.explain) {
      for (const { rule, points } of explainScore(pick, img.width, img.height)) {
        console.log(chalk.gray(`  ${rule.padEnd(24)}${points > 0 ? '+' : ''}${points}`));
      }
    }
  }

  if (options.out) await exportRects(img, frameRects(result.autoPick), options.out);
}

async function runIrregular(file: string, options: IrregularOptions): Promise<void> {
  applyVerbose(options);
  const config = irregularConfigFromOptions(await loadConfigFile(options.config), options);
  const img = await loadPng(file);
  const clusters = detectIrregular(img, config);

  if (options.json) {
    console.log(JSON.stringify({ mode: 'irregular', clusters, autoPick: clusters }, null, 2));
  } else {
    console.log(chalk.bold(`\n${file}: ${img.width}×${img.height}, ${clusters.length} sprite(s)\n`));
    for (const line of formatClusterTable(clusters)) console.log(line);

    const summary = summarizeClusters(clusters);
    if (summary) {
      const shape = summary.uniform ? chalk.green('uniform') : chalk.yellow('mixed sizes');
      console.log(
        `\nMedian size ${summary.medianWidth}×${summary.medianHeight} (${shape}), ` +
          `roughly ${summary.cols} column(s) × ${summary.rows} row(s)`
      );
    }
  }

  if (options.out) {
    const rects = clusters.map(c => ({
      x: c.box.x0,
      y: c.box.y0,
      width: c.box.x1 - c.box.x0,
      height: c.box.y1 - c.box.y0,
    }));
    await exportRects(img, rects, options.out);
  }
}

function fail(error: unknown): never {
  console.error(chalk.red(`Error: ${formatError(error)}`));
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command();

  program.name('spritecut').description('Detect frame layouts and sprites on sprite sheets').version('0.1.0');

  program
    .command('grid <file>')
    .description('Rank uniform grid and strip layouts for a PNG sheet')
    .option('--min-frames <n>', 'Fewest frames a layout may have', parseInteger)
    .option('--max-frames <n>', 'Most frames a layout may have', parseInteger)
    .option('--strip-threshold <ratio>', 'Aspect ratio above which strips are tried', parseNumber)
    .option('--no-align', 'Skip aligning candidates to sheet content')
    .option('-t, --top <n>', 'Rows shown in the table', parseInteger, 10)
    .option('--explain', 'Show the scoring rules that fired for the auto pick')
    .option('-o, --out <dir>', 'Write the auto pick frames as PNG files')
    .option('-c, --config <path>', 'JSON config file')
    .option('--json', 'Print the detection result as JSON')
    .option('-v, --verbose', 'Debug logging')
    .action(async (file: string, options: GridOptions) => {
      try {
        await runGrid(file, options);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('irregular <file>')
    .description('Find individual sprites on a PNG sheet by connected components')
    .option('--noise <px>', 'Drop components smaller than this many pixels', parseInteger)
    .option('--merge <px>', 'Merge components this close together', parseInteger)
    .option('-o, --out <dir>', 'Write each sprite as a PNG file')
    .option('-c, --config <path>', 'JSON config file')
    .option('--json', 'Print the clusters as JSON')
    .option('-v, --verbose', 'Debug logging')
    .action(async (file: string, options: IrregularOptions) => {
      try {
        await runIrregular(file, options);
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync()
    .catch((error: unknown) => fail(error));
}
