import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors";
import { allMetrics, compareToBaseline, formatEvaluationReport, mae, mape, rankImportances, rmse } from "./metrics";

describe("metrics", () => {
  it("computes MAE and RMSE", () => {
    expect(mae([1, 2, 3], [2, 2, 5])).toBe(1);
    expect(rmse([1, 2, 3], [2, 2, 5])).toBeCloseTo(Math.sqrt(5 / 3));
  });

  it("leaves zero actuals out of MAPE", () => {
    expect(mape([0, 10, 20], [5, 12, 15])).toBeCloseTo(22.5);
    expect(mape([0, 0], [1, 2])).toBeNaN();
  });

  it("rejects misaligned inputs", () => {
    expect(() => allMetrics([1, 2], [1])).toThrow(ConfigurationError);
  });
});

describe("compareToBaseline", () => {
  it("reports percentage improvement per metric", () => {
    const imp = compareToBaseline({ mae: 5, rmse: 8, mape: 30 }, { mae: 10, rmse: 10, mape: 0 });
    expect(imp).toEqual({ mae: 50, rmse: 20, mape: null });
  });
});

describe("rankImportances", () => {
  it("sorts by importance, then by name", () => {
    expect(rankImportances({ b: 0.2, a: 0.2, c: 0.6 })).toEqual([
      { feature: "c", importance: 0.6 },
      { feature: "a", importance: 0.2 },
      { feature: "b", importance: 0.2 },
    ]);
  });
});

describe("formatEvaluationReport", () => {
  it("prints model, baseline and improvement blocks", () => {
    const report = formatEvaluationReport({ mae: 5, rmse: 8, mape: 30 }, { mae: 10, rmse: 10, mape: 0 });
    expect(report.split("\n")).toEqual([
      "Model Metrics:",
      "    MAE     : 5.00",
      "    RMSE    : 8.00",
      "    MAPE    : 30.00%",
      "Baseline Metrics:",
      "    MAE     : 10.00",
      "    RMSE    : 10.00",
      "    MAPE    : 0.00%",
      "Improvements over Baseline:",
      "    MAE Improvement  : 50.0%",
      "    RMSE Improvement : 20.0%",
      "    MAPE Improvement : n/a",
    ]);
  });
});
