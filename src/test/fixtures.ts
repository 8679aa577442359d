// ─── Test fixtures: small deterministic panels ──────────────────────────────

import { addMonths, parseISO } from "date-fns";
import { formatDate } from "@/lib/panel-loader";
import type { PanelRecord, PipelineSettings, RawRow } from "@/lib/types";

export function d(iso: string): Date {
  return parseISO(iso);
}

export function series(
  agency: string,
  sku: string,
  start: string,
  volumes: (number | null)[],
  exogenous: (i: number) => Record<string, number | null> = () => ({}),
): PanelRecord[] {
  return volumes.map((volume, i) => ({
    agency,
    sku,
    date: addMonths(d(start), i),
    volume,
    exogenous: exogenous(i),
  }));
}

export function toRawRows(panel: PanelRecord[]): RawRow[] {
  return panel.map((r) => {
    const row: RawRow = { date: formatDate(r.date), agency: r.agency, sku: r.sku };
    if (r.volume !== null) row.volume = String(r.volume);
    for (const [k, v] of Object.entries(r.exogenous)) row[k] = v === null ? "" : String(v);
    return row;
  });
}

export const SETTINGS: PipelineSettings = {
  lags: [1, 3],
  rollingWindows: [2],
  aggregateFallback: "null",
  unseenEntityPolicy: "error",
};

/**
 * 2 agencies × 3 SKUs, monthly from 2015-01 for `months` months.
 * discount_in_percent is constant and is dropped by schema inference.
 */
export function salesPanel(months = 36): PanelRecord[] {
  const agencies = ["A1", "A2"];
  const skus = ["S1", "S2", "S3"];
  return agencies.flatMap((agency, a) =>
    skus.flatMap((sku, s) =>
      series(
        agency,
        sku,
        "2015-01-01",
        Array.from({ length: months }, (_, i) => 50 + 10 * a + 5 * s + (i % 12) * 3 + Math.floor(i / 12) * 2),
        (i) => ({
          avg_max_temp: 20 + (i % 12),
          price_actual: 1000 + 10 * i,
          discount_in_percent: 5,
        }),
      ),
    ),
  );
}
