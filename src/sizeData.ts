// src/sizeData.ts
import * as d3 from 'd3';
import { AxisLimits } from './axisLimits';
import { DegenerateCompositionError } from './pieGeometry';

/** Diameter (points) given to the largest pie when sizes are derived from the data. */
export const DEFAULT_PIE_DIAMETER = 50;

export type SizeData = number | number[];

export function autoSizeData(pieData: readonly (readonly number[])[]): number[] {
  const totals = pieData.map(row => d3.sum(row));
  const maxTotal = d3.max(totals) ?? 0;
  if (!(maxTotal > 0)) {
    throw new DegenerateCompositionError(totals);
  }
  return totals.map(t => DEFAULT_PIE_DIAMETER * (t / maxTotal));
}

export function resolveDiameters(sizeData: number | readonly number[], count: number): number[] {
  if (typeof sizeData === 'number') {
    return new Array<number>(count).fill(sizeData);
  }
  if (sizeData.length !== count) {
    throw new RangeError(`Expected ${count} sizes, got ${sizeData.length}`);
  }
  return sizeData.slice();
}

/**
 * Data units per unit of wedge radius. Wedges live on the unit circle, so
 * scaling by this factor gives a pie of `diameter` device units on an axis
 * spanning `limits` over `extent` device units.
 */
export function deviceToDataScale(limits: AxisLimits, extent: number, diameter: number): number {
  return ((limits[1] - limits[0]) * (diameter / 2)) / extent;
}
