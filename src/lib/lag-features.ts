// ─── Lag / rolling features over each entity's own ordered series ───────────

import { getMonth, getYear } from "date-fns";
import { ConfigurationError } from "./errors";
import { assertSorted, entityId } from "./panel-loader";
import { TARGET_COLUMN, type FeatureValues, type PanelRecord } from "./types";

export function lagColumn(lag: number): string {
  return `${TARGET_COLUMN}_lag_${lag}`;
}

export function rollingColumn(window: number): string {
  return `${TARGET_COLUMN}_rolling_mean_${window}`;
}

function assertPeriods(periods: number[], name: string): void {
  for (const p of periods) {
    if (!Number.isInteger(p) || p <= 0) throw new ConfigurationError(`${name} must be positive integers, got ${p}`);
  }
}

/** Months since year 0; consecutive calendar months differ by one. */
export function monthIndex(date: Date): number {
  return getYear(date) * 12 + getMonth(date);
}

/**
 * One feature record per panel row, aligned by index.
 *
 * `volume_lag_L[t]` is the entity's volume for the calendar month L months
 * before t. `volume_rolling_mean_W[t]` averages months t-W..t-1 and never
 * reads month t. Both are null when a month in the look-back is absent from
 * the entity's series or holds a null volume.
 */
export function lagFeatures(panel: readonly PanelRecord[], lags: number[], windows: number[]): FeatureValues[] {
  assertPeriods(lags, "lags");
  assertPeriods(windows, "rolling windows");
  assertSorted(panel);

  const out = new Array<FeatureValues>(panel.length);
  let start = 0;
  while (start < panel.length) {
    const id = entityId(panel[start]);
    let end = start;
    while (end < panel.length && entityId(panel[end]) === id) end++;

    const byMonth = new Map<number, number | null>();
    for (let i = start; i < end; i++) byMonth.set(monthIndex(panel[i].date), panel[i].volume);

    for (let i = start; i < end; i++) {
      const m = monthIndex(panel[i].date);
      const row: FeatureValues = {};
      for (const lag of lags) row[lagColumn(lag)] = byMonth.get(m - lag) ?? null;
      for (const w of windows) row[rollingColumn(w)] = trailingMean(byMonth, m, w);
      out[i] = row;
    }
    start = end;
  }
  return out;
}

function trailingMean(byMonth: Map<number, number | null>, month: number, window: number): number | null {
  let sum = 0;
  for (let m = month - window; m < month; m++) {
    const v = byMonth.get(m);
    if (v === null || v === undefined) return null;
    sum += v;
  }
  return sum / window;
}
