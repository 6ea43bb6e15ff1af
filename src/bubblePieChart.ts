// src/bubblePieChart.ts
// Chart model for bubble pies: owns data, limit modes and the wedge cache,
// and turns a viewport into a frame the renderer can draw.

import {
  AxisLimits, ViewportGeometry,
  assertLimits, solveAxisLimits,
} from './axisLimits';
import { BubblePieConfig, LimitsMode, LineStyle } from './chartConfig';
import { ChartState } from './chartState';
import { buildColormap, normalizeColorOrder } from './palette';
import { Wedge, buildPieWedges } from './pieGeometry';
import { deviceToDataScale, resolveDiameters } from './sizeData';
import { DataMismatch, verifyDataProperties } from './validate';

export type Axis = 'x' | 'y';

export interface PiePlacement {
  index: number;
  x: number;
  y: number;
  /** Device units (points). */
  diameter: number;
  /** Data units per unit of wedge radius along each axis. */
  sx: number;
  sy: number;
  wedges: readonly Wedge[];
}

export interface LegendEntry {
  category: number;
  label: string;
  color: string;
}

export interface ChartFrame {
  visible: boolean;
  warning: DataMismatch | null;
  viewport: ViewportGeometry;
  xLimits: AxisLimits;
  yLimits: AxisLimits;
  pies: PiePlacement[];
  colormap: string[];
  legend: LegendEntry[];
  lineStyle: LineStyle;
  title: string;
  subtitle: string;
  xLabel: string;
  yLabel: string;
}

function wedgeCacheKey(row: readonly number[], budget: number): string {
  return `${budget}|${row.join(',')}`;
}

export class BubblePieChart {
  private cfg: BubblePieConfig;
  private xLimits: AxisLimits;
  private yLimits: AxisLimits;
  private modes: Record<Axis, LimitsMode>;
  private wedgeCache = new Map<string, readonly Wedge[]>();

  constructor(config: BubblePieConfig) {
    this.cfg = {
      ...config,
      xData: config.xData.slice(),
      yData: config.yData.slice(),
      pieData: config.pieData.map(r => r.slice()),
      sizeData: typeof config.sizeData === 'number' ? config.sizeData : config.sizeData.slice(),
      labels: config.labels.slice(),
      colorOrder: normalizeColorOrder(config.colorOrder),
    };
    this.xLimits = assertLimits(config.xLimits);
    this.yLimits = assertLimits(config.yLimits);
    this.modes = { x: config.xLimitsMode, y: config.yLimitsMode };
  }

  // ---------- data ----------

  setPositions(xData: readonly number[], yData: readonly number[]): void {
    this.cfg.xData = xData.slice();
    this.cfg.yData = yData.slice();
  }

  setPieData(pieData: readonly (readonly number[])[]): void {
    this.cfg.pieData = pieData.map(r => r.slice());
    this.pruneWedgeCache();
  }

  setSizeData(sizeData: number | readonly number[]): void {
    this.cfg.sizeData = typeof sizeData === 'number' ? sizeData : sizeData.slice();
  }

  setResolutionBudget(budget: number): void {
    if (!Number.isInteger(budget) || budget < 1) {
      throw new RangeError(`resolutionBudget must be a positive integer, got ${budget}`);
    }
    this.cfg.resolutionBudget = budget;
    this.pruneWedgeCache();
  }

  // ---------- styling ----------

  setLineStyle(style: LineStyle): void {
    this.cfg.lineStyle = style;
  }

  setLabels(labels: readonly string[]): void {
    this.cfg.labels = labels.slice();
  }

  setColorOrder(colors: readonly string[]): void {
    this.cfg.colorOrder = normalizeColorOrder(colors);
  }

  getColorOrder(): string[] {
    return this.cfg.colorOrder.slice();
  }

  setTitle(title: string, subtitle = ''): void {
    this.cfg.title = title;
    this.cfg.subtitle = subtitle;
  }

  setAxisLabels(xLabel: string, yLabel: string): void {
    this.cfg.xLabel = xLabel;
    this.cfg.yLabel = yLabel;
  }

  // ---------- limits ----------

  getLimits(axis: Axis): AxisLimits {
    return axis === 'x' ? this.xLimits : this.yLimits;
  }

  getLimitsMode(axis: Axis): LimitsMode {
    return this.modes[axis];
  }

  setLimitsMode(axis: Axis, mode: LimitsMode): void {
    this.modes[axis] = mode;
  }

  /** Explicit limits pin the axis: it switches to manual mode. */
  setXLimits(limits: readonly number[]): void {
    this.xLimits = assertLimits(limits);
    this.modes.x = 'manual';
  }

  setYLimits(limits: readonly number[]): void {
    this.yLimits = assertLimits(limits);
    this.modes.y = 'manual';
  }

  /**
   * Pan/zoom hook: moves the visible window without touching the modes,
   * so the next update of an auto axis snaps it back.
   */
  setWorkingLimits(x: readonly number[], y: readonly number[]): void {
    this.xLimits = assertLimits(x);
    this.yLimits = assertLimits(y);
  }

  restoreView(viewport: ViewportGeometry): ChartFrame {
    return this.update(viewport);
  }

  // ---------- state ----------

  getChartState(): ChartState {
    const state: ChartState = {};
    if (this.modes.x === 'manual') state.xLim = this.xLimits;
    if (this.modes.y === 'manual') state.yLim = this.yLimits;
    return state;
  }

  loadState(state: ChartState): void {
    if (state.xLim) this.setXLimits(state.xLim);
    if (state.yLim) this.setYLimits(state.yLim);
  }

  // ---------- frame ----------

  getWedgeCacheSize(): number {
    return this.wedgeCache.size;
  }

  update(viewport: ViewportGeometry): ChartFrame {
    const cfg = this.cfg;
    const warning = verifyDataProperties(cfg);
    if (warning) {
      console.warn(`[bubblePieChart] ${warning.code}: ${warning.message}`);
      return this.frame(viewport, warning, [], []);
    }

    const count = cfg.xData.length;
    const categoryCount = cfg.pieData[0]?.length ?? 0;
    const colormap = buildColormap(categoryCount, cfg.colorOrder);
    if (count === 0) {
      return this.frame(viewport, null, [], colormap);
    }

    const wedgeSets = cfg.pieData.map(row => this.wedgesFor(row));
    const diameters = resolveDiameters(cfg.sizeData, count);

    // solve both before assigning so a failed axis leaves the limits untouched
    const xLimits = this.modes.x === 'auto'
      ? solveAxisLimits(cfg.xData, diameters, viewport.width)
      : this.xLimits;
    const yLimits = this.modes.y === 'auto'
      ? solveAxisLimits(cfg.yData, diameters, viewport.height)
      : this.yLimits;
    this.xLimits = xLimits;
    this.yLimits = yLimits;

    const pies: PiePlacement[] = wedgeSets.map((wedges, i) => ({
      index: i,
      x: cfg.xData[i],
      y: cfg.yData[i],
      diameter: diameters[i],
      sx: deviceToDataScale(this.xLimits, viewport.width, diameters[i]),
      sy: deviceToDataScale(this.yLimits, viewport.height, diameters[i]),
      wedges,
    }));

    return this.frame(viewport, null, pies, colormap);
  }

  private frame(
    viewport: ViewportGeometry,
    warning: DataMismatch | null,
    pies: PiePlacement[],
    colormap: string[]
  ): ChartFrame {
    // Only the first pie contributes legend entries.
    const legend: LegendEntry[] = (pies[0]?.wedges ?? []).map(w => ({
      category: w.category,
      label: this.cfg.labels[w.category] ?? `data${w.category + 1}`,
      color: colormap[w.category],
    }));

    return {
      visible: warning === null,
      warning,
      viewport: { ...viewport },
      xLimits: this.xLimits,
      yLimits: this.yLimits,
      pies,
      colormap,
      legend,
      lineStyle: this.cfg.lineStyle,
      title: this.cfg.title,
      subtitle: this.cfg.subtitle,
      xLabel: this.cfg.xLabel,
      yLabel: this.cfg.yLabel,
    };
  }

  private wedgesFor(row: readonly number[]): readonly Wedge[] {
    const key = wedgeCacheKey(row, this.cfg.resolutionBudget);
    let wedges = this.wedgeCache.get(key);
    if (!wedges) {
      wedges = buildPieWedges(row, this.cfg.resolutionBudget);
      this.wedgeCache.set(key, wedges);
    }
    return wedges;
  }

  private pruneWedgeCache(): void {
    const live = new Set(this.cfg.pieData.map(r => wedgeCacheKey(r, this.cfg.resolutionBudget)));
    for (const key of Array.from(this.wedgeCache.keys())) {
      if (!live.has(key)) this.wedgeCache.delete(key);
    }
  }
}
