// ─── Evaluation metrics and the training report ─────────────────────────────

import { ConfigurationError } from "./errors";
import type { FeatureImportance, RegressionMetrics } from "./types";

function assertAligned(actual: number[], predicted: number[]): void {
  if (actual.length !== predicted.length) {
    throw new ConfigurationError(`${actual.length} actual values vs ${predicted.length} predictions`);
  }
}

export function mae(actual: number[], predicted: number[]): number {
  assertAligned(actual, predicted);
  if (!actual.length) return NaN;
  return actual.reduce((s, a, i) => s + Math.abs(a - predicted[i]), 0) / actual.length;
}

export function rmse(actual: number[], predicted: number[]): number {
  assertAligned(actual, predicted);
  if (!actual.length) return NaN;
  return Math.sqrt(actual.reduce((s, a, i) => s + (a - predicted[i]) ** 2, 0) / actual.length);
}

/** Percentage; rows with a zero actual are left out. */
export function mape(actual: number[], predicted: number[]): number {
  assertAligned(actual, predicted);
  let sum = 0, n = 0;
  actual.forEach((a, i) => {
    if (a === 0) return;
    sum += Math.abs((a - predicted[i]) / a);
    n++;
  });
  return n ? (sum / n) * 100 : NaN;
}

export function allMetrics(actual: number[], predicted: number[]): RegressionMetrics {
  return { mae: mae(actual, predicted), rmse: rmse(actual, predicted), mape: mape(actual, predicted) };
}

export type Improvements = Record<keyof RegressionMetrics, number | null>;

/** Percentage improvement of the model over the baseline, per metric. */
export function compareToBaseline(model: RegressionMetrics, baseline: RegressionMetrics): Improvements {
  const pct = (m: number, b: number) => (b !== 0 && Number.isFinite(b) ? ((b - m) / b) * 100 : null);
  return {
    mae: pct(model.mae, baseline.mae),
    rmse: pct(model.rmse, baseline.rmse),
    mape: pct(model.mape, baseline.mape),
  };
}

export function rankImportances(importances: Record<string, number>): FeatureImportance[] {
  return Object.entries(importances)
    .map(([feature, importance]) => ({ feature, importance }))
    .sort((a, b) => b.importance - a.importance || (a.feature < b.feature ? -1 : 1));
}

export function formatEvaluationReport(model: RegressionMetrics, baseline?: RegressionMetrics): string {
  const lines = [
    "Model Metrics:",
    `    MAE     : ${model.mae.toFixed(2)}`,
    `    RMSE    : ${model.rmse.toFixed(2)}`,
    `    MAPE    : ${model.mape.toFixed(2)}%`,
  ];
  if (baseline) {
    const imp = compareToBaseline(model, baseline);
    const fmt = (v: number | null) => (v === null ? "n/a" : `${v.toFixed(1)}%`);
    lines.push(
      "Baseline Metrics:",
      `    MAE     : ${baseline.mae.toFixed(2)}`,
      `    RMSE    : ${baseline.rmse.toFixed(2)}`,
      `    MAPE    : ${baseline.mape.toFixed(2)}%`,
      "Improvements over Baseline:",
      `    MAE Improvement  : ${fmt(imp.mae)}`,
      `    RMSE Improvement : ${fmt(imp.rmse)}`,
      `    MAPE Improvement : ${fmt(imp.mape)}`,
    );
  }
  return lines.join("\n");
}
