import type { Point } from '../types.js';
import { Orientation, orientation } from './orientation.js';

function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Point lies on the closed segment a–b. */
function isPointOnSegment(point: Point, a: Point, b: Point): boolean {
  if (orientation(a, b, point) !== Orientation.Collinear) return false;
  return (
    point.x >= Math.min(a.x, b.x) && point.x <= Math.max(a.x, b.x) &&
    point.y >= Math.min(a.y, b.y) && point.y <= Math.max(a.y, b.y)
  );
}

/**
 * Inside-or-on test for a counter-clockwise convex polygon.
 * Fewer than 3 vertices are treated as nothing, a single point, or a segment.
 */
export function isPointInConvexPolygon(point: Point, polygon: readonly Point[]): boolean {
  if (polygon.length === 0) return false;
  if (polygon.length === 1) return samePoint(point, polygon[0]);
  if (polygon.length === 2) return isPointOnSegment(point, polygon[0], polygon[1]);

  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    if (orientation(polygon[j], polygon[i], point) === Orientation.Clockwise) {
      return false;
    }
  }
  return true;
}

/** True when every point lies inside or on the polygon. */
export function containsAll(polygon: readonly Point[], points: readonly Point[]): boolean {
  return points.every(p => isPointInConvexPolygon(p, polygon));
}

/** Compare two point sequences as coordinate sets, ignoring order and repeats. */
export function sameVertexSet(a: readonly Point[], b: readonly Point[]): boolean {
  const key = (p: Point) => `${p.x},${p.y}`;
  const left = new Set(a.map(key));
  const right = new Set(b.map(key));
  if (left.size !== right.size) return false;
  for (const k of left) {
    if (!right.has(k)) return false;
  }
  return true;
}
