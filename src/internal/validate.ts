import type { Point } from '../types.js';
import { InvalidInputError } from '../errors.js';

/** Reject any point whose coordinates are not finite numbers. */
export function assertFinitePoints(points: readonly Point[]): void {
  for (let i = 0; i < points.length; i++) {
    const { x, y } = points[i];
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new InvalidInputError(`point ${i} has non-finite coordinates (${x}, ${y})`, i);
    }
  }
}
