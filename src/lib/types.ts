// ─── Panel ──────────────────────────────────────────────────────────────────

export const KEY_COLUMNS = ["agency", "sku"] as const;
export const DATE_COLUMN = "date";
export const TARGET_COLUMN = "volume";

export type KeyColumn = (typeof KEY_COLUMNS)[number];

export interface EntityKey {
  agency: string;
  sku: string;
}

export interface PanelRecord extends EntityKey {
  date: Date;
  // null only for rows awaiting a prediction
  volume: number | null;
  exogenous: Record<string, number | null>;
}

export type RawRow = Record<string, string | undefined>;

export interface PanelSchema {
  exogenousColumns: string[];
  droppedConstantColumns: string[];
  ignoredColumns: string[];
}

export interface PanelInfo {
  rowCount: number;
  columnCount: number;
  dateRange: { min: string; max: string } | null;
  agencyCount: number;
  skuCount: number;
}

// ─── Features ───────────────────────────────────────────────────────────────

export interface CalendarFeatures {
  year: number;
  month: number;
  day: number;
  day_of_week: number;
  week_of_year: number;
  quarter: number;
}

export type FeatureValues = Record<string, number | null>;

export interface FeatureRow extends EntityKey {
  date: Date;
  volume: number | null;
  features: FeatureValues;
}

export interface FeatureFrame {
  columns: string[];
  rows: FeatureRow[];
}

export interface DesignMatrix {
  X: number[][];
  y: number[];
  rows: FeatureRow[];
  dropped: number;
}

// ─── Policies ───────────────────────────────────────────────────────────────

export type AggregateFallback = "null" | "global_mean";
export type UnseenEntityPolicy = "error" | "unknown";

export type Cutoff = { date: Date } | { periodsBeforeMax: number };

// ─── Learned state ──────────────────────────────────────────────────────────

export interface HistoricalStatistics {
  byAgencySkuMonth: Record<string, number>;
  byAgencySku: Record<string, number>;
  bySkuMonth: Record<string, number>;
  globalMean: number;
}

export interface EncoderTable {
  readonly values: readonly string[];
  readonly codes: ReadonlyMap<string, number>;
}

export interface EntityEncoders {
  agency: EncoderTable;
  sku: EncoderTable;
}

export interface PipelineSettings {
  lags: number[];
  rollingWindows: number[];
  aggregateFallback: AggregateFallback;
  unseenEntityPolicy: UnseenEntityPolicy;
}

export interface TrainingArtifacts {
  readonly version: 1;
  readonly settings: Readonly<PipelineSettings>;
  readonly schema: Readonly<PanelSchema>;
  readonly featureColumns: readonly string[];
  readonly statistics: Readonly<HistoricalStatistics>;
  readonly encoders: EntityEncoders;
  readonly history: readonly PanelRecord[];
}

// ─── Outputs ────────────────────────────────────────────────────────────────

export interface PredictionRow extends EntityKey {
  date: Date;
  prediction: number;
}

export interface RegressionMetrics {
  mae: number;
  rmse: number;
  mape: number;
}

export interface FeatureImportance {
  feature: string;
  importance: number;
}
