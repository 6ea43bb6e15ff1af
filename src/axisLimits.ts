// src/axisLimits.ts
import * as d3 from 'd3';

/** Data-space [min, max] of one axis, always strictly increasing. */
export type AxisLimits = readonly [number, number];

export interface PointLayout {
  x: number;
  y: number;
  /** Pie diameter in device units (points). */
  diameter: number;
}

/** Plot area in device units. */
export interface ViewportGeometry {
  width: number;
  height: number;
}

export class DegenerateLimitsError extends Error {
  constructor(public readonly lo: number, public readonly hi: number) {
    super(`Solved axis limits [${lo}, ${hi}] are not increasing`);
    this.name = 'DegenerateLimitsError';
  }
}

export function assertLimits(limits: readonly number[]): AxisLimits {
  if (
    limits.length !== 2 ||
    !Number.isFinite(limits[0]) ||
    !Number.isFinite(limits[1]) ||
    limits[1] <= limits[0]
  ) {
    throw new Error('Specify limits as two increasing values.');
  }
  return [limits[0], limits[1]];
}

export function dataToPixel(limits: AxisLimits, extent: number, value: number): number {
  return d3.scaleLinear().domain([limits[0], limits[1]]).range([0, extent])(value);
}

/**
 * Tightest limits that keep every pie on screen along one axis.
 *
 * The extreme positions are pinned so that the largest pie radius (capped at a
 * third of the viewport) just touches the edges:
 *   pixel(min) = r,  pixel(max) = extent - r
 * which is the linear system
 *   (P - r) lo + r hi = min P
 *   r lo + (P - r) hi = max P
 */
export function solveAxisLimits(
  positions: readonly number[],
  diametersDevice: number | readonly number[],
  viewportPixelExtent: number
): AxisLimits {
  let minV = d3.min(positions);
  let maxV = d3.max(positions);
  if (minV === undefined || maxV === undefined) {
    throw new RangeError('Cannot compute axis limits without positions');
  }
  if (minV === maxV) {
    minV -= 1;
    maxV += 1;
  }

  const maxDiameter = typeof diametersDevice === 'number'
    ? diametersDevice
    : (d3.max(diametersDevice) ?? 0);

  const P = viewportPixelExtent;
  const r = Math.min(maxDiameter / 2, P / 3);

  const a = P - r;
  const det = a * a - r * r;
  const lo = (a * minV * P - r * maxV * P) / det;
  const hi = (a * maxV * P - r * minV * P) / det;

  if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo >= hi) {
    throw new DegenerateLimitsError(lo, hi);
  }
  return [lo, hi];
}

export function solveViewportLimits(
  layout: readonly PointLayout[],
  viewport: ViewportGeometry
): { x: AxisLimits; y: AxisLimits } {
  const diameters = layout.map(p => p.diameter);
  return {
    x: solveAxisLimits(layout.map(p => p.x), diameters, viewport.width),
    y: solveAxisLimits(layout.map(p => p.y), diameters, viewport.height),
  };
}
