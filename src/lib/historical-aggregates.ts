// ─── Historical Aggregates: frozen grouped means, joined by key ─────────────

import { getMonth } from "date-fns";
import { EmptyPartitionError } from "./errors";
import type { AggregateFallback, FeatureValues, HistoricalStatistics, PanelRecord } from "./types";

export const AGGREGATE_COLUMNS = [
  "mean_volume_agency_sku_month",
  "mean_volume_agency_sku",
  "mean_volume_sku_month",
] as const;

type GroupKeyFn = (r: PanelRecord) => string;

const monthOf = (r: PanelRecord) => getMonth(r.date) + 1;

const GROUPINGS: { column: (typeof AGGREGATE_COLUMNS)[number]; table: keyof Omit<HistoricalStatistics, "globalMean">; key: GroupKeyFn }[] = [
  { column: "mean_volume_agency_sku_month", table: "byAgencySkuMonth", key: (r) => JSON.stringify([r.agency, r.sku, monthOf(r)]) },
  { column: "mean_volume_agency_sku", table: "byAgencySku", key: (r) => JSON.stringify([r.agency, r.sku]) },
  { column: "mean_volume_sku_month", table: "bySkuMonth", key: (r) => JSON.stringify([r.sku, monthOf(r)]) },
];

function groupMeans(panel: readonly PanelRecord[], key: GroupKeyFn): Record<string, number> {
  const acc = new Map<string, { sum: number; n: number }>();
  for (const r of panel) {
    if (r.volume === null) continue;
    const k = key(r);
    const cur = acc.get(k) ?? { sum: 0, n: 0 };
    cur.sum += r.volume;
    cur.n++;
    acc.set(k, cur);
  }
  const out: Record<string, number> = {};
  for (const [k, { sum, n }] of acc) out[k] = sum / n;
  return out;
}

/** Fit on the reference (training) panel only. */
export function fitHistoricalStatistics(panel: readonly PanelRecord[]): HistoricalStatistics {
  const volumes = panel.flatMap((r) => (r.volume === null ? [] : [r.volume]));
  if (!volumes.length) throw new EmptyPartitionError("Cannot fit historical statistics on a panel without volumes");

  return {
    byAgencySkuMonth: groupMeans(panel, GROUPINGS[0].key),
    byAgencySku: groupMeans(panel, GROUPINGS[1].key),
    bySkuMonth: groupMeans(panel, GROUPINGS[2].key),
    globalMean: volumes.reduce((a, b) => a + b, 0) / volumes.length,
  };
}

/**
 * Left join of each frozen table onto the panel. Unmatched keys are null, or
 * the reference global mean under the `global_mean` fallback.
 */
export function applyHistoricalStatistics(
  panel: readonly PanelRecord[],
  stats: HistoricalStatistics,
  fallback: AggregateFallback,
): FeatureValues[] {
  const missing = fallback === "global_mean" ? stats.globalMean : null;
  return panel.map((r) => {
    const row: FeatureValues = {};
    for (const g of GROUPINGS) {
      const table = stats[g.table];
      const k = g.key(r);
      row[g.column] = Object.prototype.hasOwnProperty.call(table, k) ? table[k] : missing;
    }
    return row;
  });
}
