// ─── Feature Assembly Pipeline ──────────────────────────────────────────────
// calendar → historical aggregates → lag/rolling → categorical encoding.
// fitTransform learns statistics + encoders from a training panel; transform
// replays them unchanged. Neither keeps state between calls.

import { historyDepth } from "./config";
import { CALENDAR_COLUMNS, calendarFeatures } from "./calendar-features";
import { encode, fitEntityEncoders } from "./entity-encoder";
import { ConfigurationError } from "./errors";
import { AGGREGATE_COLUMNS, applyHistoricalStatistics, fitHistoricalStatistics } from "./historical-aggregates";
import { lagColumn, lagFeatures, rollingColumn } from "./lag-features";
import { assertSorted, entityId, sortPanel } from "./panel-loader";
import type {
  DesignMatrix,
  EntityEncoders,
  FeatureFrame,
  FeatureRow,
  HistoricalStatistics,
  PanelRecord,
  PanelSchema,
  PipelineSettings,
  TrainingArtifacts,
} from "./types";

export const ENCODED_COLUMNS = ["agency_encoded", "sku_encoded"] as const;

/** Canonical ordered feature list; depends only on settings and the frozen schema. */
export function featureColumns(schema: PanelSchema, settings: PipelineSettings): string[] {
  return [
    ...ENCODED_COLUMNS,
    ...CALENDAR_COLUMNS,
    ...AGGREGATE_COLUMNS,
    ...settings.lags.map(lagColumn),
    ...settings.rollingWindows.map(rollingColumn),
    ...schema.exogenousColumns,
  ];
}

export function assertColumns(expected: readonly string[], actual: readonly string[]): void {
  const same = expected.length === actual.length && expected.every((c, i) => c === actual[i]);
  if (!same) {
    throw new ConfigurationError(
      `Feature columns differ from training: expected [${expected.join(", ")}], got [${actual.join(", ")}]`,
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Trailing history
// ═══════════════════════════════════════════════════════════════════════════════

/** Last `depth` records of every entity in a sorted panel. */
export function trailingHistory(panel: readonly PanelRecord[], depth: number): PanelRecord[] {
  const byEntity = new Map<string, PanelRecord[]>();
  for (const r of panel) {
    const id = entityId(r);
    if (!byEntity.has(id)) byEntity.set(id, []);
    byEntity.get(id)?.push(r);
  }
  return sortPanel([...byEntity.values()].flatMap((rows) => rows.slice(-depth)));
}

function contextFor(panel: readonly PanelRecord[], history: readonly PanelRecord[]): PanelRecord[] {
  const firstDate = new Map<string, number>();
  for (const r of panel) {
    const id = entityId(r);
    const t = r.date.getTime();
    const cur = firstDate.get(id);
    if (cur === undefined || t < cur) firstDate.set(id, t);
  }
  return history.filter((h) => {
    const first = firstDate.get(entityId(h));
    return first !== undefined && h.date.getTime() < first;
  });
}

function freezeRecord(r: PanelRecord): PanelRecord {
  return Object.freeze({ ...r, exogenous: Object.freeze({ ...r.exogenous }) });
}

function freezeArtifacts(artifacts: TrainingArtifacts): TrainingArtifacts {
  return Object.freeze({
    ...artifacts,
    settings: Object.freeze({ ...artifacts.settings }),
    schema: Object.freeze({ ...artifacts.schema }),
    featureColumns: Object.freeze([...artifacts.featureColumns]),
    statistics: Object.freeze({ ...artifacts.statistics }),
    history: Object.freeze(artifacts.history.map(freezeRecord)),
  });
}

export function buildArtifacts(parts: Omit<TrainingArtifacts, "version" | "featureColumns">): TrainingArtifacts {
  return freezeArtifacts({
    version: 1,
    ...parts,
    featureColumns: featureColumns(parts.schema, parts.settings),
  });
}

/**
 * Same statistics and encoders, with the trailing window moved forward to the
 * end of `panel` (records already in the old window are kept unless `panel`
 * has the same entity and date).
 */
export function withHistory(artifacts: TrainingArtifacts, panel: readonly PanelRecord[]): TrainingArtifacts {
  const incoming = new Set(panel.map((r) => `${entityId(r)}@${r.date.getTime()}`));
  const kept = artifacts.history.filter((h) => !incoming.has(`${entityId(h)}@${h.date.getTime()}`));
  const merged = sortPanel([...kept, ...panel]);
  return freezeArtifacts({ ...artifacts, history: trailingHistory(merged, historyDepth(artifacts.settings)) });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Assembly
// ═══════════════════════════════════════════════════════════════════════════════

interface AssemblyInputs {
  settings: PipelineSettings;
  schema: PanelSchema;
  statistics: HistoricalStatistics;
  encoders: EntityEncoders;
  context: PanelRecord[];
}

function assemble(panel: readonly PanelRecord[], inputs: AssemblyInputs): FeatureFrame {
  const { settings, schema, statistics, encoders } = inputs;
  assertSorted(panel);

  const emitted = new Set<PanelRecord>(panel);
  const combined = sortPanel([...inputs.context, ...panel]);
  const columns = featureColumns(schema, settings);

  const calendar = combined.map((r) => calendarFeatures(r.date));
  const aggregates = applyHistoricalStatistics(combined, statistics, settings.aggregateFallback);
  const lagged = lagFeatures(combined, settings.lags, settings.rollingWindows);

  const rows: FeatureRow[] = [];
  combined.forEach((r, i) => {
    if (!emitted.has(r)) return;
    const values: Record<string, number | null> = {
      agency_encoded: encode(encoders.agency, "agency", r.agency, settings.unseenEntityPolicy),
      sku_encoded: encode(encoders.sku, "sku", r.sku, settings.unseenEntityPolicy),
      ...calendar[i],
      ...aggregates[i],
      ...lagged[i],
    };
    for (const col of schema.exogenousColumns) values[col] = r.exogenous[col] ?? null;

    const features: Record<string, number | null> = {};
    for (const col of columns) features[col] = values[col] ?? null;
    rows.push({ agency: r.agency, sku: r.sku, date: r.date, volume: r.volume, features });
  });

  return { columns, rows };
}

export interface FitResult {
  frame: FeatureFrame;
  artifacts: TrainingArtifacts;
}

export function fitTransform(panel: readonly PanelRecord[], schema: PanelSchema, settings: PipelineSettings): FitResult {
  const statistics = fitHistoricalStatistics(panel);
  const encoders = fitEntityEncoders(panel);
  const artifacts = buildArtifacts({
    settings,
    schema,
    statistics,
    encoders,
    history: trailingHistory(panel, historyDepth(settings)),
  });
  const frame = assemble(panel, { settings, schema, statistics, encoders, context: [] });
  return { frame, artifacts };
}

/**
 * Replays fitted statistics and encoders. The artifacts' trailing history is
 * prepended as lag context for each entity; context rows are not emitted.
 */
export function transform(panel: readonly PanelRecord[], artifacts: TrainingArtifacts): FeatureFrame {
  const settings = { ...artifacts.settings };
  const schema = { ...artifacts.schema };
  assertColumns(artifacts.featureColumns, featureColumns(schema, settings));

  return assemble(panel, {
    settings,
    schema,
    statistics: artifacts.statistics,
    encoders: artifacts.encoders,
    context: contextFor(panel, artifacts.history),
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Model input
// ═══════════════════════════════════════════════════════════════════════════════

export interface DesignOptions {
  requireTarget: boolean;
}

/** Keeps rows whose every feature is defined; the rest are counted as dropped. */
export function toDesignMatrix(frame: FeatureFrame, { requireTarget }: DesignOptions): DesignMatrix {
  const X: number[][] = [];
  const y: number[] = [];
  const rows: FeatureRow[] = [];

  for (const row of frame.rows) {
    if (requireTarget && row.volume === null) continue;
    const x: number[] = [];
    for (const col of frame.columns) {
      const v = row.features[col];
      if (v === null || v === undefined) break;
      x.push(v);
    }
    if (x.length !== frame.columns.length) continue;
    X.push(x);
    y.push(row.volume ?? 0);
    rows.push(row);
  }
  return { X, y, rows, dropped: frame.rows.length - rows.length };
}
