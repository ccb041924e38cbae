import type { Point } from '../../src/types.js';
import { createSeededRandom, generateRandomPoints } from '../../src/point-source.js';

/** Create a Point. */
export function makePoint(x: number, y: number): Point {
  return { x, y };
}

/** Create points from coordinate pairs. */
export function makePoints(coords: [number, number][]): Point[] {
  return coords.map(([x, y]) => makePoint(x, y));
}

/** Sorted copy, for comparing hulls as sets. */
export function sortPoints(points: readonly Point[]): Point[] {
  return [...points].sort((a, b) => a.x - b.x || a.y - b.y);
}

/** Vertices of a regular polygon, counter-clockwise from the top. */
export function makeRegularPolygon(sides: number, radius: number = 1, cx: number = 0, cy: number = 0): Point[] {
  const points: Point[] = [];
  for (let i = 0; i < sides; i++) {
    const angle = Math.PI / 2 + (2 * Math.PI * i) / sides;
    points.push(makePoint(cx + radius * Math.cos(angle), cy + radius * Math.sin(angle)));
  }
  return points;
}

/** Reproducible uniform cloud in [0, 100)². */
export function makeCloud(count: number, seed: number): Point[] {
  return generateRandomPoints(count, { random: createSeededRandom(seed) });
}

/** Unit square corners plus its centre. */
export function makeSquareWithCentre(): Point[] {
  return makePoints([[0, 0], [1, 0], [1, 1], [0, 1], [0.5, 0.5]]);
}
