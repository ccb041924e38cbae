import type { Point } from '../types.js';

/** Turn direction of an ordered point triple. */
export const Orientation = {
  Collinear: 0,
  Clockwise: 1,
  CounterClockwise: 2,
} as const;

export type Orientation = typeof Orientation[keyof typeof Orientation];

/**
 * Classify the turn p → q → r.
 * Exact comparison against zero; near-collinear triples are not snapped.
 */
export function orientation(p: Point, q: Point, r: Point): Orientation {
  const cross = (q.y - p.y) * (r.x - q.x) - (q.x - p.x) * (r.y - q.y);
  if (cross === 0) return Orientation.Collinear;
  return cross > 0 ? Orientation.Clockwise : Orientation.CounterClockwise;
}

/**
 * Signed position of p relative to the directed line p1 → p2.
 * Positive on the left. The magnitude is twice the area of (p1, p2, p),
 * so it doubles as a distance proxy along a fixed line.
 */
export function side(p1: Point, p2: Point, p: Point): number {
  return (p.y - p1.y) * (p2.x - p1.x) - (p2.y - p1.y) * (p.x - p1.x);
}
