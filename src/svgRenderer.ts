// src/svgRenderer.ts
import * as d3 from 'd3';
import { ChartFrame, PiePlacement } from './bubblePieChart';
import { LineStyle } from './chartConfig';
import { Vec2, Wedge } from './pieGeometry';

export interface Margins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface SvgRenderOptions {
  margin?: Partial<Margins>;
  fontFamily?: string;
  tickCount?: number;
  /** Id of the plot clip path; make it unique when several charts share a page. */
  clipId?: string;
}

const STROKE_DASH: Record<LineStyle, string | null> = {
  '-': null,
  '--': '6,4',
  ':': '1,3',
  '-.': '6,3,1,3',
  'none': null,
};

const LEGEND_SWATCH = 10;
const LEGEND_ROW = 18;

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function strokeAttrs(style: LineStyle): string {
  if (style === 'none') return 'stroke="none"';
  const dash = STROKE_DASH[style];
  return `stroke="#000000" stroke-width="0.5"${dash ? ` stroke-dasharray="${dash}"` : ''}`;
}

function defaultMargins(frame: ChartFrame): Margins {
  const titleLines = (frame.title ? 1 : 0) + (frame.subtitle ? 1 : 0);
  return {
    top: 16 + titleLines * 20,
    right: frame.legend.length > 0 ? 120 : 16,
    bottom: frame.xLabel ? 48 : 32,
    left: frame.yLabel ? 64 : 48,
  };
}

function wedgePath(
  pie: PiePlacement,
  w: Wedge,
  x: d3.ScaleLinear<number, number>,
  y: d3.ScaleLinear<number, number>
): string {
  const line = d3.line<Readonly<Vec2>>()
    .x(p => x(pie.x + p[0] * pie.sx))
    .y(p => y(pie.y + p[1] * pie.sy));
  return `${line(w.points.slice()) ?? ''}Z`;
}

/** Renders a chart frame as a standalone SVG document. */
export function renderBubblePieSvg(frame: ChartFrame, opts: SvgRenderOptions = {}): string {
  const m: Margins = { ...defaultMargins(frame), ...opts.margin };
  const font = opts.fontFamily ?? 'Arial, sans-serif';
  const tickCount = opts.tickCount ?? 5;
  const clipId = escapeXml(opts.clipId ?? 'plot-area');

  const vw = frame.viewport.width;
  const vh = frame.viewport.height;
  const width = m.left + vw + m.right;
  const height = m.top + vh + m.bottom;

  const x = d3.scaleLinear().domain([frame.xLimits[0], frame.xLimits[1]]).range([0, vw]);
  const y = d3.scaleLinear().domain([frame.yLimits[0], frame.yLimits[1]]).range([vh, 0]);

  const out: string[] = [];
  out.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="${escapeXml(font)}">`);
  out.push(`  <defs><clipPath id="${clipId}"><rect width="${vw}" height="${vh}"/></clipPath></defs>`);

  let titleY = 20;
  if (frame.title) {
    out.push(`  <text class="title" x="${width / 2}" y="${titleY}" text-anchor="middle" font-size="14" font-weight="600">${escapeXml(frame.title)}</text>`);
    titleY += 20;
  }
  if (frame.subtitle) {
    out.push(`  <text class="subtitle" x="${width / 2}" y="${titleY}" text-anchor="middle" font-size="12">${escapeXml(frame.subtitle)}</text>`);
  }

  out.push(`  <g class="plot" transform="translate(${m.left},${m.top})">`);
  out.push(`    <rect class="frame" width="${vw}" height="${vh}" fill="none" stroke="#333333"/>`);

  for (const t of x.ticks(tickCount)) {
    out.push(`    <text class="tick x" x="${x(t)}" y="${vh + 14}" text-anchor="middle" font-size="10">${escapeXml(x.tickFormat(tickCount)(t))}</text>`);
  }
  for (const t of y.ticks(tickCount)) {
    out.push(`    <text class="tick y" x="-6" y="${y(t)}" text-anchor="end" dominant-baseline="middle" font-size="10">${escapeXml(y.tickFormat(tickCount)(t))}</text>`);
  }

  if (frame.visible) {
    const stroke = strokeAttrs(frame.lineStyle);
    out.push(`    <g class="pies" clip-path="url(#${clipId})">`);
    for (const pie of frame.pies) {
      out.push(`      <g class="pie" data-index="${pie.index}">`);
      for (const w of pie.wedges) {
        out.push(`        <path class="wedge" data-category="${w.category}" d="${wedgePath(pie, w, x, y)}" fill="${frame.colormap[w.category]}" ${stroke}/>`);
      }
      out.push('      </g>');
    }
    out.push('    </g>');
  }
  out.push('  </g>');

  if (frame.xLabel) {
    out.push(`  <text class="x-label" x="${m.left + vw / 2}" y="${height - 12}" text-anchor="middle" font-size="12">${escapeXml(frame.xLabel)}</text>`);
  }
  if (frame.yLabel) {
    const cy = m.top + vh / 2;
    out.push(`  <text class="y-label" x="16" y="${cy}" text-anchor="middle" font-size="12" transform="rotate(-90,16,${cy})">${escapeXml(frame.yLabel)}</text>`);
  }

  if (frame.visible && frame.legend.length > 0) {
    const lx = m.left + vw + 12;
    out.push(`  <g class="legend" transform="translate(${lx},${m.top})">`);
    frame.legend.forEach((entry, i) => {
      const ly = i * LEGEND_ROW;
      out.push(`    <rect x="0" y="${ly}" width="${LEGEND_SWATCH}" height="${LEGEND_SWATCH}" fill="${entry.color}"/>`);
      out.push(`    <text x="${LEGEND_SWATCH + 6}" y="${ly + LEGEND_SWATCH / 2}" dominant-baseline="middle" font-size="11">${escapeXml(entry.label)}</text>`);
    });
    out.push('  </g>');
  }

  out.push('</svg>');
  return out.join('\n');
}
