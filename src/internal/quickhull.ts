import type { Point, QuickhullPartition } from '../types.js';
import type { HullTask } from './types.js';
import { side } from './orientation.js';

/**
 * Baseline endpoints: smallest and largest x.
 * Ties on x go to the lower point for the min and the higher point for the max,
 * so a vertical input still yields its two extremes.
 */
export function findBaseline(points: readonly Point[]): { minPoint: Point; maxPoint: Point } {
  let minPoint = points[0];
  let maxPoint = points[0];

  for (const p of points) {
    if (p.x < minPoint.x || (p.x === minPoint.x && p.y < minPoint.y)) minPoint = p;
    if (p.x > maxPoint.x || (p.x === maxPoint.x && p.y > maxPoint.y)) maxPoint = p;
  }

  return { minPoint, maxPoint };
}

/** Farthest candidate strictly on `sideFlag` of p1 → p2, plus every candidate on that side. */
export function findFarthest(
  candidates: readonly Point[],
  p1: Point,
  p2: Point,
  sideFlag: 1 | -1,
): { farthest: Point | undefined; outside: Point[] } {
  let maxDist = 0;
  let farthest: Point | undefined;
  const outside: Point[] = [];

  for (const p of candidates) {
    const s = side(p1, p2, p);
    if (Math.sign(s) !== sideFlag) continue;
    outside.push(p);
    const dist = Math.abs(s);
    if (dist > maxDist) {
      maxDist = dist;
      farthest = p;
    }
  }

  return { farthest, outside };
}

/** The side flag that points away from `opposite` across the line a → b. */
function awayFrom(a: Point, b: Point, opposite: Point): 1 | -1 {
  return side(a, b, opposite) > 0 ? -1 : 1;
}

/**
 * Expand one chain of the hull.
 *
 * Runs the recursive split on an explicit stack so deep inputs cannot exhaust
 * the call stack. Tasks are pushed in reverse so vertices come out in the same
 * order as `left chain, farthest point, right chain`.
 */
export function expandChain(
  points: readonly Point[],
  p1: Point,
  p2: Point,
  sideFlag: 1 | -1,
  partition: QuickhullPartition,
): Point[] {
  const chain: Point[] = [];
  const stack: HullTask[] = [{ kind: 'split', candidates: points, p1, p2, sideFlag }];

  while (stack.length > 0) {
    const task = stack.pop();
    if (task === undefined) break;

    if (task.kind === 'emit') {
      chain.push(task.point);
      continue;
    }

    const { farthest, outside } = findFarthest(task.candidates, task.p1, task.p2, task.sideFlag);
    if (farthest === undefined) continue;

    const candidates = partition === 'shrinking' ? outside : points;
    stack.push(
      {
        kind: 'split',
        candidates,
        p1: farthest,
        p2: task.p2,
        sideFlag: awayFrom(farthest, task.p2, task.p1),
      },
      { kind: 'emit', point: farthest },
      {
        kind: 'split',
        candidates,
        p1: task.p1,
        p2: farthest,
        sideFlag: awayFrom(task.p1, farthest, task.p2),
      },
    );
  }

  return chain;
}

/** Quickhull over an already validated point set. */
export function runQuickhull(points: readonly Point[], partition: QuickhullPartition): Point[] {
  if (points.length < 3) return [...points];

  const { minPoint, maxPoint } = findBaseline(points);

  return [
    ...expandChain(points, minPoint, maxPoint, 1, partition),
    ...expandChain(points, minPoint, maxPoint, -1, partition),
    minPoint,
    maxPoint,
  ];
}
