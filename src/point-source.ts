import { readFile } from 'node:fs/promises';
import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import type { Point, RandomPointOptions } from './types.js';
import { InvalidInputError } from './errors.js';

const MAX_SEED = 0xffffffff;

/**
 * Deterministic uniform source in [0, 1) (32-bit LCG).
 * Same seed, same sequence. Seeds are unsigned 32-bit integers.
 */
export function createSeededRandom(seed: number): () => number {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new InvalidInputError(`seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
  }
  let state = seed | 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) | 0;
    return (state >>> 0) / 0x100000000;
  };
}

/** Generate `count` uniform points in [min, max) × [min, max). */
export function generateRandomPoints(count: number, options: RandomPointOptions = {}): Point[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidInputError(`point count must be a non-negative integer, got ${count}`);
  }
  const { min = 0, max = 100, random = Math.random } = options;
  const span = max - min;

  const points: Point[] = [];
  for (let i = 0; i < count; i++) {
    points.push({ x: min + random() * span, y: min + random() * span });
  }
  return points;
}

function readRecords(text: string): string[][] {
  let records: unknown;
  try {
    records = parse(text, {
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (err) {
    if (err instanceof CsvError) {
      throw new InvalidInputError(`malformed point file: ${err.message}`, undefined, { cause: err });
    }
    throw err;
  }

  if (!Array.isArray(records)) return [];
  return records.filter((r): r is string[] =>
    Array.isArray(r) && r.every(field => typeof field === 'string'),
  );
}

/** Plain decimal notation, optionally with an exponent. No hex, binary or octal. */
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseCoordinate(field: string, record: number): number {
  const value = DECIMAL.test(field) ? Number(field) : NaN;
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`record ${record}: "${field}" is not a finite decimal number`, record - 1);
  }
  return value;
}

/**
 * Parse the point file format: a count line followed by one `x,y` line per point.
 * Blank lines and whitespace around values are ignored.
 */
export function parsePointFile(text: string): Point[] {
  const [header, ...rows] = readRecords(text);
  if (header === undefined) {
    throw new InvalidInputError('point file is empty');
  }

  const expected = header.length === 1 && /^\d+$/.test(header[0]) ? Number(header[0]) : NaN;
  if (!Number.isInteger(expected) || expected < 0) {
    throw new InvalidInputError(`invalid point count line: "${header.join(',')}"`);
  }

  const points = rows.map((fields, i) => {
    const record = i + 1;
    if (fields.length !== 2) {
      throw new InvalidInputError(`record ${record}: expected 2 values, got ${fields.length}`, i);
    }
    return { x: parseCoordinate(fields[0], record), y: parseCoordinate(fields[1], record) };
  });

  if (points.length !== expected) {
    throw new InvalidInputError(`point file declares ${expected} points but contains ${points.length}`);
  }
  return points;
}

/** Read and parse a point file from disk. */
export async function loadPointFile(path: string): Promise<Point[]> {
  const text = await readFile(path, 'utf8');
  return parsePointFile(text);
}
