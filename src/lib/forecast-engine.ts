// ─── Forecast Engine ────────────────────────────────────────────────────────
// Training run, batch prediction on new rows, recursive multi-month forecast,
// and expanding-window cross-validation.

import Papa from "papaparse";
import { addMonths, eachMonthOfInterval, startOfMonth } from "date-fns";
import { carryForward } from "./carry-forward";
import type { ForecastConfig } from "./config";
import { UNKNOWN_CODE, decode } from "./entity-encoder";
import { ConfigurationError, InsufficientHistoryError } from "./errors";
import { assertColumns, fitTransform, toDesignMatrix, transform, withHistory } from "./feature-pipeline";
import { GradientBoostedRegressor, type Regressor } from "./gbt-regressor";
import { getLogger } from "./logger";
import { allMetrics, compareToBaseline, formatEvaluationReport, rankImportances, type Improvements } from "./metrics";
import { describePanel, formatDate, inferSchema, normalizePanel, sortPanel } from "./panel-loader";
import { selectDates, temporalSplit, timeSeriesFolds } from "./temporal-split";
import type {
  Cutoff,
  DesignMatrix,
  FeatureImportance,
  FeatureRow,
  PanelInfo,
  PanelRecord,
  PanelSchema,
  PipelineSettings,
  PredictionRow,
  RawRow,
  RegressionMetrics,
  TrainingArtifacts,
} from "./types";

const log = getLogger("forecast-engine");

export function pipelineSettings(config: ForecastConfig): PipelineSettings {
  return {
    lags: [...config.lags],
    rollingWindows: [...config.rollingWindows],
    aggregateFallback: config.aggregateFallback,
    unseenEntityPolicy: config.unseenEntityPolicy,
  };
}

function requireRows(design: DesignMatrix, what: string): void {
  if (!design.rows.length) {
    throw new InsufficientHistoryError(`No ${what} rows survived feature engineering (${design.dropped} dropped).`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Training
// ═══════════════════════════════════════════════════════════════════════════════

export interface TrainingInput {
  rows: RawRow[];
  cutoff: Cutoff;
  config: ForecastConfig;
}

export interface TrainingRun {
  model: GradientBoostedRegressor;
  artifacts: TrainingArtifacts;
  info: PanelInfo;
  cutoff: Date;
  trainSize: number;
  testSize: number;
  droppedRows: { train: number; test: number };
  metrics: RegressionMetrics;
  baselineMetrics: RegressionMetrics;
  improvements: Improvements;
  importances: FeatureImportance[];
}

export function runTraining({ rows, cutoff, config }: TrainingInput): TrainingRun {
  const schema = inferSchema(rows, config.exogenousColumns);
  const panel = normalizePanel(rows, schema, { requireTarget: true });
  const info = describePanel(panel, schema);
  log.info("Panel loaded", { ...info });

  const split = temporalSplit(panel, cutoff);
  log.info("Temporal split", { cutoff: formatDate(split.cutoff), train: split.train.length, test: split.test.length });

  const fitted = fitTransform(split.train, schema, pipelineSettings(config));
  const testFrame = transform(split.test, fitted.artifacts);
  assertColumns(fitted.frame.columns, testFrame.columns);

  const train = toDesignMatrix(fitted.frame, { requireTarget: true });
  const test = toDesignMatrix(testFrame, { requireTarget: true });
  requireRows(train, "training");
  requireRows(test, "test");
  log.info("Features assembled", { features: fitted.frame.columns.length, trainDropped: train.dropped, testDropped: test.dropped });

  const model = new GradientBoostedRegressor(config.model).fit(train.X, train.y, { X: test.X, y: test.y });
  log.info("Model trained", { iterations: model.bestIteration });

  const metrics = allMetrics(test.y, model.predict(test.X));
  const baselineMetrics = allMetrics(
    test.y,
    test.rows.map((r) => r.features.mean_volume_agency_sku_month ?? 0),
  );
  log.info(`Evaluation\n${formatEvaluationReport(metrics, baselineMetrics)}`);

  const importances = rankImportances(model.featureImportances(fitted.frame.columns));
  log.debug("Feature importance", { top: importances.slice(0, 10) });

  return {
    model,
    // Inference continues from the last observed period, not the cutoff
    artifacts: withHistory(fitted.artifacts, panel),
    info,
    cutoff: split.cutoff,
    trainSize: train.rows.length,
    testSize: test.rows.length,
    droppedRows: { train: train.dropped, test: test.dropped },
    metrics,
    baselineMetrics,
    improvements: compareToBaseline(metrics, baselineMetrics),
    importances,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Prediction
// ═══════════════════════════════════════════════════════════════════════════════

export interface PredictionResult {
  predictions: PredictionRow[];
  dropped: number;
}

function decodeRow(row: FeatureRow, artifacts: TrainingArtifacts): { agency: string; sku: string } {
  const agencyCode = row.features.agency_encoded ?? UNKNOWN_CODE;
  const skuCode = row.features.sku_encoded ?? UNKNOWN_CODE;
  return {
    agency: agencyCode === UNKNOWN_CODE ? row.agency : decode(artifacts.encoders.agency, "agency", agencyCode),
    sku: skuCode === UNKNOWN_CODE ? row.sku : decode(artifacts.encoders.sku, "sku", skuCode),
  };
}

function predictPanel(panel: PanelRecord[], model: Regressor, artifacts: TrainingArtifacts): PredictionResult & { filled: PanelRecord[] } {
  const { panel: filled } = carryForward(panel, artifacts.history, [...artifacts.schema.exogenousColumns]);
  const frame = transform(filled, artifacts);
  const design = toDesignMatrix(frame, { requireTarget: false });
  const predictions = model.predict(design.X).map((p, i) => ({
    date: design.rows[i].date,
    ...decodeRow(design.rows[i], artifacts),
    prediction: Math.max(0, p),
  }));
  return { predictions, dropped: design.dropped, filled };
}

/** Batch prediction for newly arrived rows; target values may be absent. */
export function predictNewRows(rows: RawRow[], model: Regressor, artifacts: TrainingArtifacts): PredictionResult {
  const panel = normalizePanel(rows, { ...artifacts.schema }, { requireTarget: false });
  const { predictions, dropped } = predictPanel(panel, model, artifacts);
  if (dropped) log.warn("Rows dropped for insufficient history", { dropped, kept: predictions.length });
  if (!predictions.length) {
    throw new InsufficientHistoryError(`No rows to predict after feature engineering (${dropped} dropped).`);
  }
  return { predictions, dropped };
}

export interface ForecastRange {
  startDate: Date;
  endDate: Date;
}

/**
 * Month-start forecast for every agency × sku known to the encoders. Each
 * month's predictions become the volumes the following months lag on. Months
 * between the end of the stored history and `startDate` are forecast the same
 * way but not returned.
 */
export function forecastRange({ startDate, endDate }: ForecastRange, model: Regressor, artifacts: TrainingArtifacts): PredictionResult {
  if (startDate > endDate) {
    throw new ConfigurationError(`Forecast start ${formatDate(startDate)} is after end ${formatDate(endDate)}`);
  }
  const firstEmitted = startOfMonth(startDate);
  const lastObserved = artifacts.history.reduce<Date | null>((m, r) => (!m || r.date > m ? r.date : m), null);
  const nextUnobserved = lastObserved ? addMonths(startOfMonth(lastObserved), 1) : firstEmitted;
  const first = nextUnobserved < firstEmitted ? nextUnobserved : firstEmitted;
  const months = eachMonthOfInterval({ start: first, end: endDate });
  if (first < firstEmitted) {
    log.info("Forecasting unobserved months before the requested range", {
      from: formatDate(first),
      months: months.filter((m) => m < firstEmitted).length,
    });
  }

  const { agency: agencies, sku: skus } = artifacts.encoders;
  const emptyExogenous = () => Object.fromEntries(artifacts.schema.exogenousColumns.map((c) => [c, null]));

  let state = artifacts;
  let dropped = 0;
  const predictions: PredictionRow[] = [];

  for (const month of months) {
    const panel = sortPanel(
      agencies.values.flatMap((agency) =>
        skus.values.map((sku): PanelRecord => ({ agency, sku, date: month, volume: null, exogenous: emptyExogenous() })),
      ),
    );
    const step = predictPanel(panel, model, state);
    if (month >= firstEmitted) {
      dropped += step.dropped;
      predictions.push(...step.predictions);
    }

    const predicted = new Map(step.predictions.map((p) => [`${p.agency}\u0000${p.sku}`, p.prediction]));
    const observed = step.filled.flatMap((r) => {
      const volume = predicted.get(`${r.agency}\u0000${r.sku}`);
      return volume === undefined ? [] : [{ ...r, volume }];
    });
    state = withHistory(state, observed);
  }

  if (dropped) log.warn("Combinations without enough history were skipped", { dropped });
  if (!predictions.length) {
    throw new InsufficientHistoryError(`No forecast rows survived feature engineering (${dropped} dropped).`);
  }
  return { predictions, dropped };
}

export function formatPredictionsCsv(rows: PredictionRow[]): string {
  return Papa.unparse(
    rows.map((r) => ({ date: formatDate(r.date), agency: r.agency, sku: r.sku, prediction: r.prediction })),
    { columns: ["date", "agency", "sku", "prediction"] },
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Cross-validation
// ═══════════════════════════════════════════════════════════════════════════════

export interface FoldScore {
  fold: number;
  trainSize: number;
  testSize: number;
  mae: number;
  rmse: number;
}

export function crossValidate(
  panel: PanelRecord[],
  schema: PanelSchema,
  config: ForecastConfig,
  nSplits = 5,
): FoldScore[] {
  return timeSeriesFolds(panel, nSplits).map(({ fold, trainDates, testDates }) => {
    const fitted = fitTransform(selectDates(panel, trainDates), schema, pipelineSettings(config));
    const train = toDesignMatrix(fitted.frame, { requireTarget: true });
    const test = toDesignMatrix(transform(selectDates(panel, testDates), fitted.artifacts), { requireTarget: true });
    requireRows(train, `fold ${fold} training`);
    requireRows(test, `fold ${fold} test`);

    const model = new GradientBoostedRegressor(config.model).fit(train.X, train.y);
    const { mae, rmse } = allMetrics(test.y, model.predict(test.X));
    log.info("Fold scored", { fold, trainSize: train.rows.length, testSize: test.rows.length, mae, rmse });
    return { fold, trainSize: train.rows.length, testSize: test.rows.length, mae, rmse };
  });
}
