import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import type { Point } from './types.js';
import { InvalidInputError } from './errors.js';
import { HullComparer, formatComparison } from './hull.js';
import { createSeededRandom, generateRandomPoints, loadPointFile } from './point-source.js';
import { generateComparisonSvg, generateHullSteps } from './internal/svg-generator.js';

/** Where the CLI reports. Defaults to the console. */
export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
}

const consoleIO: CliIO = {
  log: message => console.log(message),
  error: message => console.error(message),
};

export const USAGE = 'Usage: planar-hull [--file <path>] [--count <n>] [--seed <n>] [--svg-dir <dir>]';

/** Points sampled when neither --file nor --count is given. */
const DEFAULT_COUNT = 15;

function parseInteger(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidInputError(`invalid --${flag} value: ${value}`);
  }
  return parsed;
}

async function writeFrames(dir: string, prefix: string, frames: string[]): Promise<void> {
  for (let i = 0; i < frames.length; i++) {
    const step = String(i + 1).padStart(2, '0');
    await writeFile(join(dir, `${prefix}-step-${step}.svg`), frames[i]);
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      file: { type: 'string', short: 'f' },
      count: { type: 'string', short: 'n' },
      seed: { type: 'string' },
      'svg-dir': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  }).values;
}

/** Run the comparison CLI. Resolves to the process exit code. */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  let values: ReturnType<typeof parseCliArgs>;
  try {
    values = parseCliArgs(argv);
  } catch (err) {
    // parseArgs rejects unknown flags and missing values with a TypeError
    if (!(err instanceof TypeError)) throw err;
    io.error(err.message);
    io.error(USAGE);
    return 1;
  }

  if (values.help) {
    io.log(USAGE);
    return 0;
  }

  let points: Point[];
  try {
    if (values.file !== undefined) {
      points = await loadPointFile(values.file);
    } else {
      const count = parseInteger('count', values.count, DEFAULT_COUNT);
      const random = values.seed === undefined
        ? Math.random
        : createSeededRandom(parseInteger('seed', values.seed, 0));
      points = generateRandomPoints(count, { random });
    }
  } catch (err) {
    if (err instanceof InvalidInputError) {
      io.error(err.message);
      return 1;
    }
    throw err;
  }

  const report = new HullComparer().compare(points);
  for (const line of formatComparison(report)) {
    io.log(line);
  }

  const svgDir = values['svg-dir'];
  if (svgDir !== undefined) {
    await mkdir(svgDir, { recursive: true });
    await writeFile(
      join(svgDir, 'comparison.svg'),
      generateComparisonSvg(points, report.graham.hull, report.quickhull.hull),
    );
    await writeFrames(svgDir, 'graham', generateHullSteps(points, report.graham.hull, { stroke: 'red' }));
    await writeFrames(svgDir, 'quickhull', generateHullSteps(points, report.quickhull.hull, { stroke: 'green' }));
    io.log(`SVG written to ${svgDir}`);
  }

  return 0;
}
