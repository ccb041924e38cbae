import type { Point, QuickhullPartition } from '../types.js';

/** A pending Quickhull step on the explicit work-list. */
export type HullTask =
  | {
      kind: 'split';
      /** Points scanned for the farthest one. */
      candidates: readonly Point[];
      p1: Point;
      p2: Point;
      /** Which side of p1 → p2 to search. */
      sideFlag: 1 | -1;
    }
  | { kind: 'emit'; point: Point };

/** Resolved config with all defaults applied. */
export interface ResolvedConfig {
  quickhullPartition: QuickhullPartition;
  now: () => number;
}

/** Data-space bounds of a point set. */
export interface Bounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}
