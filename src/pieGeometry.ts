// src/pieGeometry.ts
import * as d3 from 'd3';

export const DEFAULT_RESOLUTION_BUDGET = 100;

/** Slices start at 12 o'clock and run counter-clockwise. */
export const PIE_START_ANGLE = Math.PI / 2;

export type Vec2 = [number, number];

/**
 * One slice of a unit-circle pie: origin, arc samples, origin again.
 * Angles are radians; `category` is the 0-based index into the composition.
 */
export interface Wedge {
  readonly category: number;
  readonly startAngle: number;
  readonly endAngle: number;
  readonly points: ReadonlyArray<Readonly<Vec2>>;
}

export class DegenerateCompositionError extends Error {
  constructor(
    public readonly composition: readonly number[],
    reason = 'does not sum to a positive value'
  ) {
    super(`Composition [${composition.join(', ')}] ${reason}`);
    this.name = 'DegenerateCompositionError';
  }
}

export function wedgeSpan(w: Wedge): number {
  return w.endAngle - w.startAngle;
}

/**
 * Builds the wedges of a pie inscribed in the unit circle.
 *
 * `resolutionBudget` is the number of arc segments a full circle would get;
 * each wedge receives its share of it, never fewer than one segment. A category
 * with zero share still yields a (zero-span) wedge, so the result always has
 * one wedge per composition entry.
 */
export function buildPieWedges(
  composition: readonly number[],
  resolutionBudget: number = DEFAULT_RESOLUTION_BUDGET
): Wedge[] {
  if (!Number.isInteger(resolutionBudget) || resolutionBudget < 1) {
    throw new RangeError(`resolutionBudget must be a positive integer, got ${resolutionBudget}`);
  }

  if (composition.some(v => !Number.isFinite(v) || v < 0)) {
    throw new DegenerateCompositionError(composition, 'must hold finite, non-negative values');
  }

  const total = d3.sum(composition);
  if (!Number.isFinite(total) || total <= 0) {
    throw new DegenerateCompositionError(composition);
  }

  const wedges: Wedge[] = [];
  let theta0 = PIE_START_ANGLE;

  composition.forEach((value, category) => {
    const share = value / total;
    const n = Math.max(1, Math.ceil(resolutionBudget * share));

    const points: Vec2[] = [[0, 0]];
    let reached = theta0;
    for (let k = 0; k <= n; k++) {
      const theta = theta0 + ((share * k) / n) * 2 * Math.PI;
      points.push([Math.cos(theta), Math.sin(theta)]);
      if (theta > reached) reached = theta;
    }
    points.push([0, 0]);

    wedges.push({ category, startAngle: theta0, endAngle: reached, points });
    // continue from the furthest sampled angle, not from an accumulated sum
    theta0 = reached;
  });

  return wedges;
}
