import type { Point, HullConfig, ComparisonReport, AlgorithmRun } from './types.js';
import type { ResolvedConfig } from './internal/types.js';
import { assertFinitePoints } from './internal/validate.js';
import { runGrahamScan } from './internal/graham-scan.js';
import { runQuickhull } from './internal/quickhull.js';
import { containsAll, sameVertexSet } from './internal/polygon.js';

/** Default configuration values. */
export const DEFAULT_CONFIG: Readonly<Required<HullConfig>> = {
  quickhullPartition: 'full-set',
  now: () => performance.now(),
};

/** Resolve a partial config into a full config with defaults. Undefined fields keep the default. */
function resolveConfig(config: HullConfig = {}): ResolvedConfig {
  return {
    quickhullPartition: config.quickhullPartition ?? DEFAULT_CONFIG.quickhullPartition,
    now: config.now ?? DEFAULT_CONFIG.now,
  };
}

/** Reusable, stateless hull builder. */
export class HullComparer {
  readonly config: Readonly<Required<HullConfig>>;

  constructor(config?: HullConfig) {
    this.config = resolveConfig(config);
  }

  /**
   * Convex hull by Graham's scan, counter-clockwise from the lowest point.
   * Fewer than 3 points come back as a copy of the input.
   * @throws InvalidInputError on a non-finite coordinate.
   */
  grahamScan(points: readonly Point[]): Point[] {
    assertFinitePoints(points);
    return runGrahamScan(points);
  }

  /**
   * Convex hull by Quickhull: upper chain, lower chain, then the baseline's
   * min and max points. Fewer than 3 points come back as a copy of the input.
   * @throws InvalidInputError on a non-finite coordinate.
   */
  quickhull(points: readonly Point[]): Point[] {
    assertFinitePoints(points);
    return runQuickhull(points, this.config.quickhullPartition);
  }

  /** Run both algorithms, time them, and check that they agree. */
  compare(points: readonly Point[]): ComparisonReport {
    assertFinitePoints(points);

    const graham = this.timed(() => runGrahamScan(points));
    const quick = this.timed(() => runQuickhull(points, this.config.quickhullPartition));

    return {
      pointCount: points.length,
      graham,
      quickhull: quick,
      sameVertexSet: sameVertexSet(graham.hull, quick.hull),
      grahamContainsAll: containsAll(graham.hull, points),
    };
  }

  private timed(build: () => Point[]): AlgorithmRun {
    const start = this.config.now();
    const hull = build();
    const end = this.config.now();
    return { hull, seconds: (end - start) / 1000 };
  }
}

/** Render a comparison report as printable lines. */
export function formatComparison(report: ComparisonReport): string[] {
  return [
    `Points: ${report.pointCount}`,
    `Graham's Scan took ${report.graham.seconds.toFixed(4)} seconds (${report.graham.hull.length} vertices)`,
    `Quickhull took ${report.quickhull.seconds.toFixed(4)} seconds (${report.quickhull.hull.length} vertices)`,
    `Hulls agree: ${report.sameVertexSet ? 'yes' : 'no'}`,
    `All points enclosed: ${report.grahamContainsAll ? 'yes' : 'no'}`,
  ];
}

/** Graham's scan with default config. */
export function grahamScan(points: readonly Point[]): Point[] {
  return new HullComparer().grahamScan(points);
}

/** Quickhull with default config. For repeated use, prefer creating a HullComparer instance. */
export function quickhull(points: readonly Point[]): Point[] {
  return new HullComparer().quickhull(points);
}

/** Compare both algorithms with default config. */
export function compareAlgorithms(points: readonly Point[]): ComparisonReport {
  return new HullComparer().compare(points);
}
