// src/chartConfig.ts
import yaml from 'js-yaml';
import { AxisLimits, assertLimits } from './axisLimits';
import { DEFAULT_RESOLUTION_BUDGET } from './pieGeometry';
import { DEFAULT_COLOR_ORDER, normalizeColorOrder } from './palette';
import { autoSizeData } from './sizeData';

export const LINE_STYLES = ['-', '--', ':', '-.', 'none'] as const;
export type LineStyle = typeof LINE_STYLES[number];

export const LIMITS_MODES = ['auto', 'manual'] as const;
export type LimitsMode = typeof LIMITS_MODES[number];

export interface BubblePieConfig {
  xData: number[];
  yData: number[];
  /** One row per pie, one column per category. */
  pieData: number[][];
  /** Pie diameters in points, scalar or one per pie. */
  sizeData: number | number[];
  lineStyle: LineStyle;
  labels: string[];
  title: string;
  subtitle: string;
  xLabel: string;
  yLabel: string;
  xLimitsMode: LimitsMode;
  yLimitsMode: LimitsMode;
  xLimits: AxisLimits;
  yLimits: AxisLimits;
  colorOrder: string[];
  resolutionBudget: number;
}

type RawBlock = Record<string, unknown>;

function isRecord(v: unknown): v is RawBlock {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function toNumber(v: unknown, key: string): number {
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v;
  if (typeof n !== 'number' || Number.isNaN(n)) {
    throw new Error(`${key}: expected a number, got ${JSON.stringify(v)}`);
  }
  return n;
}

function toNumberArray(v: unknown, key: string): number[] {
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v)) return [toNumber(v, key)];
  return v.map((x, i) => toNumber(x, `${key}[${i}]`));
}

function toPieData(v: unknown): number[][] {
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v)) throw new Error('pie_data: expected a list of rows');
  return v.map((row, r) => {
    const values = toNumberArray(row, `pie_data[${r}]`);
    values.forEach((x, c) => {
      if (x < 0) throw new Error(`pie_data[${r}][${c}]: values must be non-negative`);
    });
    return values;
  });
}

function toText(v: unknown): string {
  if (v === undefined || v === null) return '';
  return Array.isArray(v) ? v.map(String).join('\n') : String(v);
}

function toMember<T extends string>(v: unknown, allowed: readonly T[], fallback: T, key: string): T {
  if (v === undefined || v === null) return fallback;
  const found = allowed.find(a => a === String(v));
  if (found === undefined) {
    throw new Error(`${key}: expected one of ${allowed.map(a => `'${a}'`).join(', ')}, got '${String(v)}'`);
  }
  return found;
}

function toLimits(v: unknown, key: string): AxisLimits {
  if (v === undefined || v === null) return [0, 1];
  try {
    return assertLimits(toNumberArray(v, key));
  } catch (err) {
    throw new Error(`${key}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Builds a chart configuration from a parsed YAML/JSON document.
 * Absent keys fall back to defaults; `size_data` defaults to sizes derived
 * from the pie totals.
 */
export function buildChartConfig(raw: unknown): BubblePieConfig {
  const cfg: RawBlock = isRecord(raw) ? raw : {};

  const xData = toNumberArray(cfg.x_data, 'x_data');
  const yData = toNumberArray(cfg.y_data, 'y_data');
  const pieData = toPieData(cfg.pie_data);

  let sizeData: number | number[];
  if (cfg.size_data === undefined || cfg.size_data === null) {
    sizeData = pieData.length > 0 ? autoSizeData(pieData) : 50;
    console.info(`[chartConfig] Derived size_data from pie totals (${pieData.length} pies)`);
  } else if (Array.isArray(cfg.size_data)) {
    sizeData = toNumberArray(cfg.size_data, 'size_data');
  } else {
    sizeData = toNumber(cfg.size_data, 'size_data');
  }

  const budget = cfg.resolution_budget === undefined
    ? DEFAULT_RESOLUTION_BUDGET
    : toNumber(cfg.resolution_budget, 'resolution_budget');
  if (!Number.isInteger(budget) || budget < 1) {
    throw new Error(`resolution_budget: expected a positive integer, got ${budget}`);
  }

  const colorOrder = Array.isArray(cfg.color_order)
    ? normalizeColorOrder(cfg.color_order.map(String))
    : DEFAULT_COLOR_ORDER.slice();

  return {
    xData,
    yData,
    pieData,
    sizeData,
    lineStyle: toMember(cfg.line_style, LINE_STYLES, '-', 'line_style'),
    labels: Array.isArray(cfg.labels) ? cfg.labels.map(String) : [],
    title: toText(cfg.title),
    subtitle: toText(cfg.subtitle),
    xLabel: toText(cfg.x_label),
    yLabel: toText(cfg.y_label),
    xLimitsMode: toMember(cfg.x_limits_mode, LIMITS_MODES, 'auto', 'x_limits_mode'),
    yLimitsMode: toMember(cfg.y_limits_mode, LIMITS_MODES, 'auto', 'y_limits_mode'),
    xLimits: toLimits(cfg.x_limits, 'x_limits'),
    yLimits: toLimits(cfg.y_limits, 'y_limits'),
    colorOrder,
    resolutionBudget: budget,
  };
}

/** Parses YAML (or JSON, which is valid YAML) chart text. */
export function parseChartConfigYaml(text: string): BubblePieConfig {
  const doc = yaml.load(text);
  if (!isRecord(doc)) {
    throw new Error('Chart config must be a mapping');
  }
  return buildChartConfig(doc);
}
