// src/__tests__/PieGeometry.test.ts
import {
  DegenerateCompositionError, PIE_START_ANGLE,
  buildPieWedges, wedgeSpan,
} from '../pieGeometry';

describe('buildPieWedges', () => {
  test('one wedge per category, tagged in input order', () => {
    const wedges = buildPieWedges([3, 1, 2]);
    expect(wedges).toHaveLength(3);
    expect(wedges.map(w => w.category)).toEqual([0, 1, 2]);
  });

  test('spans add up to a full circle for any budget', () => {
    for (const budget of [1, 7, 100, 1000]) {
      const wedges = buildPieWedges([2, 5, 3.5, 0.25], budget);
      const total = wedges.reduce((acc, w) => acc + wedgeSpan(w), 0);
      expect(total).toBeCloseTo(2 * Math.PI, 10);
      expect(wedges[wedges.length - 1].endAngle - PIE_START_ANGLE).toBeCloseTo(2 * Math.PI, 10);
    }
  });

  test('each wedge starts where the previous one ended', () => {
    const wedges = buildPieWedges([1, 2, 3, 4, 5], 37);
    expect(wedges[0].startAngle).toBe(PIE_START_ANGLE);
    for (let i = 1; i < wedges.length; i++) {
      expect(wedges[i].startAngle).toBe(wedges[i - 1].endAngle);
    }
  });

  test('four equal shares give four quarter wedges', () => {
    const wedges = buildPieWedges([1, 1, 1, 1]);
    expect(wedges).toHaveLength(4);
    for (const w of wedges) {
      expect(wedgeSpan(w)).toBeCloseTo(Math.PI / 2, 12);
      // 25 segments => 26 arc samples + origin at both ends
      expect(w.points).toHaveLength(28);
    }
  });

  test('first arc sample of the first wedge points straight up', () => {
    const [first] = buildPieWedges([1, 1]);
    expect(first.points[0]).toEqual([0, 0]);
    expect(first.points[1][0]).toBeCloseTo(0, 12);
    expect(first.points[1][1]).toBeCloseTo(1, 12);
    expect(first.points[first.points.length - 1]).toEqual([0, 0]);
  });

  test('arc samples lie on the unit circle', () => {
    for (const w of buildPieWedges([4, 1, 7], 50)) {
      for (const [x, y] of w.points.slice(1, -1)) {
        expect(Math.hypot(x, y)).toBeCloseTo(1, 12);
      }
    }
  });

  test('vertex count follows the share of the budget', () => {
    const [a, b] = buildPieWedges([1, 2]);
    // ceil(100/3) = 34 and ceil(200/3) = 67 segments
    expect(a.points).toHaveLength(34 + 3);
    expect(b.points).toHaveLength(67 + 3);
  });

  test('small budgets still give every wedge one segment', () => {
    const wedges = buildPieWedges([1, 1, 1, 1], 1);
    expect(wedges.map(w => w.points.length)).toEqual([4, 4, 4, 4]);
  });

  test('zero share keeps a degenerate wedge', () => {
    const [zero, full] = buildPieWedges([0, 1]);
    expect(zero.category).toBe(0);
    expect(wedgeSpan(zero)).toBe(0);
    expect(zero.points).toHaveLength(4);
    expect(full.category).toBe(1);
    expect(wedgeSpan(full)).toBeCloseTo(2 * Math.PI, 12);
    expect(full.points).toHaveLength(100 + 3);
  });

  test('all-zero and empty compositions are rejected', () => {
    expect(() => buildPieWedges([0, 0, 0])).toThrow(DegenerateCompositionError);
    expect(() => buildPieWedges([])).toThrow(DegenerateCompositionError);
  });

  test('negative and non-finite entries are rejected', () => {
    expect(() => buildPieWedges([3, -1])).toThrow('Composition [3, -1] must hold finite, non-negative values');
    expect(() => buildPieWedges([NaN, 1])).toThrow(DegenerateCompositionError);
    expect(() => buildPieWedges([Infinity, 1])).toThrow(DegenerateCompositionError);
  });

  test('invalid budgets are rejected', () => {
    expect(() => buildPieWedges([1], 0)).toThrow(RangeError);
    expect(() => buildPieWedges([1], 2.5)).toThrow(RangeError);
  });

  test('input composition is left untouched', () => {
    const composition = [2, 6, 2];
    buildPieWedges(composition);
    expect(composition).toEqual([2, 6, 2]);
  });
});
