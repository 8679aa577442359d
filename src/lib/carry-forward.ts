// ─── History Carry-Forward: fill missing exogenous values per entity ────────

import { entityId, formatDate } from "./panel-loader";
import { getLogger } from "./logger";
import type { EntityKey, PanelRecord } from "./types";

const log = getLogger("carry-forward");

export interface UnfilledValue extends EntityKey {
  column: string;
  date: string;
}

export interface CarryForwardResult {
  panel: PanelRecord[];
  unfilled: UnfilledValue[];
}

type KnownPoints = { t: number; value: number }[];

function indexKnownValues(records: readonly PanelRecord[], columns: string[]): Map<string, KnownPoints> {
  const index = new Map<string, KnownPoints>();
  for (const r of records) {
    for (const col of columns) {
      const value = r.exogenous[col];
      if (value === null || value === undefined) continue;
      const key = `${entityId(r)}:${col}`;
      const points = index.get(key) ?? [];
      points.push({ t: r.date.getTime(), value });
      index.set(key, points);
    }
  }
  for (const points of index.values()) points.sort((a, b) => a.t - b.t);
  return index;
}

function lastBefore(points: KnownPoints | undefined, t: number): number | null {
  if (!points) return null;
  let found: number | null = null;
  for (const p of points) {
    if (p.t >= t) break;
    found = p.value;
  }
  return found;
}

/**
 * Fills null exogenous values with the entity's most recent known value dated
 * strictly before the row. The target is never filled. Entities without any
 * earlier value stay null and are reported.
 */
export function carryForward(
  panel: readonly PanelRecord[],
  history: readonly PanelRecord[],
  exogenousColumns: string[],
): CarryForwardResult {
  const known = indexKnownValues([...history, ...panel], exogenousColumns);
  const unfilled: UnfilledValue[] = [];

  const filled = panel.map((r) => {
    const exogenous = { ...r.exogenous };
    for (const col of exogenousColumns) {
      if (exogenous[col] !== null && exogenous[col] !== undefined) continue;
      const value = lastBefore(known.get(`${entityId(r)}:${col}`), r.date.getTime());
      exogenous[col] = value;
      if (value === null) unfilled.push({ agency: r.agency, sku: r.sku, column: col, date: formatDate(r.date) });
    }
    return { ...r, exogenous };
  });

  if (unfilled.length) {
    const entities = new Set(unfilled.map((u) => `${u.agency}/${u.sku}`));
    log.warn("Exogenous values left unfilled: no earlier history", {
      values: unfilled.length,
      entities: [...entities].slice(0, 10),
    });
  }
  return { panel: filled, unfilled };
}
