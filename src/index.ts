// Core
export { HullComparer, grahamScan, quickhull, compareAlgorithms, formatComparison, DEFAULT_CONFIG } from './hull.js';
export { InvalidInputError } from './errors.js';
export { Orientation, orientation, side } from './internal/orientation.js';
export { isPointInConvexPolygon, sameVertexSet } from './internal/polygon.js';

// Point sources
export { createSeededRandom, generateRandomPoints, parsePointFile, loadPointFile } from './point-source.js';

// Drawing
export { generateHullSvg, generateHullSteps, generateComparisonSvg } from './internal/svg-generator.js';

// Types
export type {
  Point,
  HullConfig,
  QuickhullPartition,
  AlgorithmRun,
  ComparisonReport,
  RandomPointOptions,
  SvgOptions,
} from './types.js';
