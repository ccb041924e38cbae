/** A point in the plane. Equality is coordinate-wise. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * How Quickhull chooses the points each sub-problem scans.
 * - `full-set`: every sub-problem rescans the whole input.
 * - `shrinking`: a sub-problem only scans points strictly outside its parent's line.
 * Both produce the same vertex sequence.
 */
export type QuickhullPartition = 'full-set' | 'shrinking';

/** Optional knobs, set on the HullComparer constructor. */
export interface HullConfig {
  /** Candidate policy for Quickhull sub-problems. Default: 'full-set' */
  quickhullPartition?: QuickhullPartition;
  /** Millisecond clock used to time each algorithm. Default: performance.now */
  now?: () => number;
}

/** One algorithm's output within a comparison. */
export interface AlgorithmRun {
  /** Hull vertices in the algorithm's own order. */
  hull: Point[];
  /** Wall-clock time spent, in seconds. */
  seconds: number;
}

/** Result of running both algorithms over the same point set. */
export interface ComparisonReport {
  /** Number of input points. */
  pointCount: number;
  graham: AlgorithmRun;
  quickhull: AlgorithmRun;
  /** Both hulls contain the same coordinates, ignoring order. */
  sameVertexSet: boolean;
  /** Every input point lies inside or on the Graham polygon. */
  grahamContainsAll: boolean;
}

/** Options for random point generation. */
export interface RandomPointOptions {
  /** Lower coordinate bound (inclusive). Default: 0 */
  min?: number;
  /** Upper coordinate bound (exclusive). Default: 100 */
  max?: number;
  /** Uniform source in [0, 1). Default: Math.random */
  random?: () => number;
}

/** Canvas options for SVG drawings. */
export interface SvgOptions {
  /** Panel width in pixels. Default: 400 */
  width?: number;
  /** Panel height in pixels. Default: 400 */
  height?: number;
  /** Blank margin around the plotted points. Default: 20 */
  padding?: number;
  /** Hull segment colour. Default: 'red' */
  stroke?: string;
}
