// src/__tests__/Palette.test.ts
import { DEFAULT_COLOR_ORDER, buildColormap, normalizeColorOrder } from '../palette';

describe('palette', () => {
  test('buildColormap cycles through the color order', () => {
    expect(buildColormap(3, ['#111111', '#222222'])).toEqual(['#111111', '#222222', '#111111']);
  });

  test('buildColormap defaults to the standard order', () => {
    expect(buildColormap(2)).toEqual([DEFAULT_COLOR_ORDER[0], DEFAULT_COLOR_ORDER[1]]);
    expect(buildColormap(0)).toEqual([]);
  });

  test('normalizeColorOrder returns #rrggbb', () => {
    expect(normalizeColorOrder(['red', '#ABC', 'rgb(0, 128, 255)'])).toEqual(['#ff0000', '#aabbcc', '#0080ff']);
  });

  test('normalizeColorOrder rejects bad input', () => {
    expect(() => normalizeColorOrder(['notacolor'])).toThrow('Invalid color: notacolor');
    expect(() => normalizeColorOrder([])).toThrow('Color order must contain at least one color');
  });
});
