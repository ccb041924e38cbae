import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { runCli, USAGE } from '../src/cli.js';
import type { CliIO } from '../src/cli.js';

function captureIO(): CliIO & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    log: message => { logs.push(message); },
    error: message => { errors.push(message); },
  };
}

describe('runCli', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'planar-hull-cli-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('compares hulls of seeded random points', async () => {
    const io = captureIO();
    const code = await runCli(['--count', '5', '--seed', '7'], io);

    expect(code).toBe(0);
    expect(io.errors).toEqual([]);
    expect(io.logs[0]).toBe('Points: 5');
    expect(io.logs[1]).toMatch(/^Graham's Scan took \d+\.\d{4} seconds \(\d+ vertices\)$/);
    expect(io.logs[2]).toMatch(/^Quickhull took \d+\.\d{4} seconds \(\d+ vertices\)$/);
    expect(io.logs[3]).toBe('Hulls agree: yes');
    expect(io.logs[4]).toBe('All points enclosed: yes');
  });

  it('samples 15 points by default', async () => {
    const io = captureIO();
    await runCli(['--seed', '1'], io);
    expect(io.logs[0]).toBe('Points: 15');
  });

  it('reads points from a file', async () => {
    const path = join(dir, 'square.txt');
    await writeFile(path, '5\n0,0\n1,0\n1,1\n0,1\n0.5,0.5\n');

    const io = captureIO();
    const code = await runCli(['--file', path], io);

    expect(code).toBe(0);
    expect(io.logs[0]).toBe('Points: 5');
    expect(io.logs[1]).toMatch(/\(4 vertices\)$/);
    expect(io.logs[3]).toBe('Hulls agree: yes');
  });

  it('fails on an invalid point file', async () => {
    const path = join(dir, 'bad.txt');
    await writeFile(path, '3\n0,0\n');

    const io = captureIO();
    const code = await runCli(['--file', path], io);

    expect(code).toBe(1);
    expect(io.errors).toEqual(['point file declares 3 points but contains 1']);
    expect(io.logs).toEqual([]);
  });

  it('fails on a non-numeric count', async () => {
    const io = captureIO();
    expect(await runCli(['--count', 'abc'], io)).toBe(1);
    expect(io.errors).toEqual(['invalid --count value: abc']);
  });

  it('fails on a seed outside the 32-bit range', async () => {
    const io = captureIO();
    expect(await runCli(['--seed', '4294967296'], io)).toBe(1);
    expect(io.errors).toEqual(['seed must be an integer in [0, 4294967295], got 4294967296']);
  });

  it('fails on an unknown flag with usage', async () => {
    const io = captureIO();
    expect(await runCli(['--bogus'], io)).toBe(1);
    expect(io.errors[io.errors.length - 1]).toBe(USAGE);
  });

  it('prints usage for --help', async () => {
    const io = captureIO();
    expect(await runCli(['--help'], io)).toBe(0);
    expect(io.logs).toEqual([USAGE]);
  });

  it('writes the comparison and step frames', async () => {
    const svgDir = join(dir, 'svg');
    const io = captureIO();
    const code = await runCli(['--count', '6', '--seed', '3', '--svg-dir', svgDir], io);

    expect(code).toBe(0);
    expect(io.logs[io.logs.length - 1]).toBe(`SVG written to ${svgDir}`);

    const files = await readdir(svgDir);
    expect(files).toContain('comparison.svg');
    expect(files).toContain('graham-step-01.svg');
    expect(files).toContain('quickhull-step-01.svg');

    const comparison = await readFile(join(svgDir, 'comparison.svg'), 'utf8');
    expect(comparison).toContain('>Quickhull</text>');
  });
});
