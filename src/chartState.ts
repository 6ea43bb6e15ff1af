// src/chartState.ts
import { AxisLimits } from './axisLimits';

/** Limits of the axes that were in manual mode when the state was taken. */
export interface ChartState {
  xLim?: AxisLimits;
  yLim?: AxisLimits;
}

const HASH_PREFIX = '#s=';

function isLimits(v: unknown): v is AxisLimits {
  return Array.isArray(v)
    && v.length === 2
    && typeof v[0] === 'number'
    && typeof v[1] === 'number'
    && v[0] < v[1];
}

function toChartState(v: unknown): ChartState | null {
  if (typeof v !== 'object' || v === null || Array.isArray(v)) return null;
  const state: ChartState = {};
  const xLim = 'xLim' in v ? v.xLim : undefined;
  const yLim = 'yLim' in v ? v.yLim : undefined;
  if (xLim !== undefined) {
    if (!isLimits(xLim)) return null;
    state.xLim = xLim;
  }
  if (yLim !== undefined) {
    if (!isLimits(yLim)) return null;
    state.yLim = yLim;
  }
  return state;
}

export function encodeChartStateToUrlToken(state: ChartState): string {
  const json = JSON.stringify(state);
  return btoa(encodeURIComponent(json));
}

// Accepts the token raw or URI-encoded, e.g. `#s=${encodeURIComponent(token)}`.
export function parseChartStateFromUrlHash(hash: string): ChartState | null {
  if (!hash.startsWith(HASH_PREFIX)) return null;
  try {
    const token = decodeURIComponent(hash.slice(HASH_PREFIX.length));
    const json = decodeURIComponent(atob(token));
    return toChartState(JSON.parse(json));
  } catch (err) {
    console.warn(`[chartState] Ignoring malformed state token: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
