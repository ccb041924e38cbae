import type { Point, SvgOptions } from '../types.js';
import type { Bounds } from './types.js';

const DEFAULT_SVG_OPTIONS: Readonly<Required<SvgOptions>> = {
  width: 400,
  height: 400,
  padding: 20,
  stroke: 'red',
};

/** Round to 2 decimals so output stays short and stable. */
function fmt(value: number): number {
  return Number(value.toFixed(2));
}

function calculateBounds(points: readonly Point[]): Bounds {
  if (points.length === 0) {
    return { minX: 0, maxX: 0, minY: 0, maxY: 0 };
  }

  let minX = Infinity, maxX = -Infinity;
  let minY = Infinity, maxY = -Infinity;

  for (const p of points) {
    minX = Math.min(minX, p.x);
    maxX = Math.max(maxX, p.x);
    minY = Math.min(minY, p.y);
    maxY = Math.max(maxY, p.y);
  }

  return { minX, maxX, minY, maxY };
}

/**
 * Map data coordinates into the panel. Uniform scale, y axis flipped so
 * larger y is drawn higher up.
 */
function createViewport(
  points: readonly Point[],
  options: Readonly<Required<SvgOptions>>,
): (p: Point) => { x: number; y: number } {
  const { minX, maxX, minY, maxY } = calculateBounds(points);
  const { width, height, padding } = options;
  const scale = Math.min(
    (width - 2 * padding) / (maxX - minX || 1),
    (height - 2 * padding) / (maxY - minY || 1),
  );

  return p => ({
    x: fmt(padding + (p.x - minX) * scale),
    y: fmt(height - padding - (p.y - minY) * scale),
  });
}

/** SVG elements (no root) for the scatter plus the first `segments` hull edges. */
function drawPanel(
  points: readonly Point[],
  hull: readonly Point[],
  segments: number,
  options: Readonly<Required<SvgOptions>>,
): string[] {
  const project = createViewport(points, options);
  const elements: string[] = [];

  for (const p of points) {
    const { x, y } = project(p);
    elements.push(`  <circle cx="${x}" cy="${y}" r="3" fill="blue" />`);
  }

  // Segments follow the hull's own order: hull[i-1] -> hull[i], left open
  for (let i = 1; i <= segments && i < hull.length; i++) {
    const a = project(hull[i - 1]);
    const b = project(hull[i]);
    elements.push(
      `  <line x1="${a.x}" y1="${a.y}" x2="${b.x}" y2="${b.y}" stroke="${options.stroke}" stroke-width="2" />`
    );
  }

  return elements;
}

function wrapSvg(elements: string[], width: number, height: number): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">\n${elements.join('\n')}\n</svg>`;
}

/** Generate an SVG of the points with every hull segment drawn. */
export function generateHullSvg(
  points: readonly Point[],
  hull: readonly Point[],
  options: SvgOptions = {},
): string {
  const resolved = { ...DEFAULT_SVG_OPTIONS, ...options };
  return wrapSvg(
    drawPanel(points, hull, hull.length - 1, resolved),
    resolved.width,
    resolved.height,
  );
}

/** One SVG per drawing step: frame k shows the first k hull segments. */
export function generateHullSteps(
  points: readonly Point[],
  hull: readonly Point[],
  options: SvgOptions = {},
): string[] {
  const resolved = { ...DEFAULT_SVG_OPTIONS, ...options };
  const frames: string[] = [];
  for (let k = 1; k < hull.length; k++) {
    frames.push(wrapSvg(drawPanel(points, hull, k, resolved), resolved.width, resolved.height));
  }
  return frames;
}

/** Both hulls side by side: Graham's scan on the left, Quickhull on the right. */
export function generateComparisonSvg(
  points: readonly Point[],
  grahamHull: readonly Point[],
  quickHull: readonly Point[],
  options: Omit<SvgOptions, 'stroke'> = {},
): string {
  const resolved = { ...DEFAULT_SVG_OPTIONS, ...options };
  const panels: { title: string; hull: readonly Point[]; stroke: string }[] = [
    { title: "Graham's Scan", hull: grahamHull, stroke: 'red' },
    { title: 'Quickhull', hull: quickHull, stroke: 'green' },
  ];

  const elements: string[] = [];
  panels.forEach((panel, i) => {
    const panelOptions = { ...resolved, stroke: panel.stroke };
    elements.push(`<g transform="translate(${i * resolved.width},0)">`);
    elements.push(`  <text x="${resolved.width / 2}" y="14" text-anchor="middle" font-size="12">${panel.title}</text>`);
    elements.push(...drawPanel(points, panel.hull, panel.hull.length - 1, panelOptions));
    elements.push('</g>');
  });

  return wrapSvg(elements, resolved.width * 2, resolved.height);
}
