// src/palette.ts
import * as d3 from 'd3';

export const DEFAULT_COLOR_ORDER: readonly string[] = [
  '#0072bd', // blue
  '#d95319', // orange
  '#edb120', // yellow
  '#7e2f8e', // purple
  '#77ac30', // green
  '#4dbeee', // light blue
  '#a2142f', // dark red
];

/** Validates CSS colours and returns them as #rrggbb. */
export function normalizeColorOrder(colors: readonly string[]): string[] {
  if (colors.length === 0) {
    throw new Error('Color order must contain at least one color');
  }
  return colors.map(css => {
    const c = d3.color(String(css).trim());
    if (!c) throw new Error(`Invalid color: ${css}`);
    return c.formatHex();
  });
}

// Categories past the end of the colour order wrap around.
export function buildColormap(
  categoryCount: number,
  colorOrder: readonly string[] = DEFAULT_COLOR_ORDER
): string[] {
  const n = colorOrder.length;
  return d3.range(categoryCount).map(i => colorOrder[i % n]);
}
