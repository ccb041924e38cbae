import type { Point } from '../types.js';
import { Orientation, orientation } from './orientation.js';

/** Lowest point, leftmost among equals. */
export function findPivot(points: readonly Point[]): Point {
  let pivot = points[0];
  for (let i = 1; i < points.length; i++) {
    const p = points[i];
    if (p.y < pivot.y || (p.y === pivot.y && p.x < pivot.x)) {
      pivot = p;
    }
  }
  return pivot;
}

/** Sort by polar angle around the pivot; equal angles fall back to (x, y). */
export function sortByPolarAngle(points: readonly Point[], pivot: Point): Point[] {
  const keyed = points.map(p => ({
    point: p,
    angle: Math.atan2(p.y - pivot.y, p.x - pivot.x),
  }));

  keyed.sort((a, b) =>
    a.angle - b.angle ||
    a.point.x - b.point.x ||
    a.point.y - b.point.y,
  );

  return keyed.map(k => k.point);
}

/**
 * Graham's scan over an already validated point set.
 * Returns vertices counter-clockwise, starting at the pivot.
 */
export function runGrahamScan(points: readonly Point[]): Point[] {
  if (points.length < 3) return [...points];

  const pivot = findPivot(points);
  const sorted = sortByPolarAngle(points, pivot);

  const hull: Point[] = [];
  for (const point of sorted) {
    // Collinear counts as "not a left turn" and is popped too
    while (
      hull.length >= 2 &&
      orientation(hull[hull.length - 2], hull[hull.length - 1], point) !== Orientation.CounterClockwise
    ) {
      hull.pop();
    }
    hull.push(point);
  }

  return hull;
}
