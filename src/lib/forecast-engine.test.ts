import { describe, expect, it } from "vitest";
import { parseConfig } from "./config";
import { ConfigurationError, InsufficientHistoryError } from "./errors";
import { crossValidate, forecastRange, formatPredictionsCsv, predictNewRows, runTraining } from "./forecast-engine";
import { formatDate, inferSchema, normalizePanel } from "./panel-loader";
import type { RawRow } from "./types";
import { d, salesPanel, toRawRows } from "@/test/fixtures";

const config = parseConfig({
  lags: [1, 2, 3],
  rollingWindows: [3],
  model: { nTrees: 30, minLeaf: 5, earlyStoppingRounds: 10 },
});
const rows = toRawRows(salesPanel());
const run = runTraining({ rows, cutoff: { date: d("2017-07-01") }, config });

const newRows = (date: string, agencies = ["A1", "A2"]): RawRow[] =>
  agencies.flatMap((agency) => ["S1", "S2", "S3"].map((sku) => ({ agency, sku, date, avg_max_temp: "21" })));

describe("runTraining", () => {
  it("trains on rows before the cutoff and evaluates on the rest", () => {
    expect(formatDate(run.cutoff)).toBe("2017-07-01");
    expect(run.trainSize).toBe(162);
    expect(run.testSize).toBe(36);
    expect(run.droppedRows).toEqual({ train: 18, test: 0 });
  });

  it("freezes the schema learned from the training data", () => {
    expect(run.artifacts.schema).toEqual({
      exogenousColumns: ["avg_max_temp", "price_actual"],
      droppedConstantColumns: ["discount_in_percent"],
      ignoredColumns: [],
    });
    expect(run.info).toMatchObject({ rowCount: 216, agencyCount: 2, skuCount: 3 });
  });

  it("carries history forward to the last observed period", () => {
    expect(run.artifacts.history).toHaveLength(18);
    expect(run.artifacts.history.map((r) => formatDate(r.date)).slice(0, 3)).toEqual([
      "2017-10-01",
      "2017-11-01",
      "2017-12-01",
    ]);
  });

  it("reports metrics and ranked importances", () => {
    expect(Number.isFinite(run.metrics.mae)).toBe(true);
    expect(Number.isFinite(run.baselineMetrics.mae)).toBe(true);
    expect(run.importances).toHaveLength(run.artifacts.featureColumns.length);
    expect(run.importances[0].importance).toBeGreaterThanOrEqual(run.importances[1].importance);
  });
});

describe("predictNewRows", () => {
  it("predicts rows without a target, filling exogenous gaps from history", () => {
    const { predictions, dropped } = predictNewRows(newRows("2018-01-01"), run.model, run.artifacts);
    expect(dropped).toBe(0);
    expect(predictions.map((p) => `${p.agency}/${p.sku}`)).toEqual([
      "A1/S1",
      "A1/S2",
      "A1/S3",
      "A2/S1",
      "A2/S2",
      "A2/S3",
    ]);
    expect(predictions.every((p) => p.prediction >= 0 && formatDate(p.date) === "2018-01-01")).toBe(true);
  });

  it("drops rows whose lags fall on unobserved periods", () => {
    const { predictions, dropped } = predictNewRows(
      [...newRows("2018-01-01"), ...newRows("2018-02-01")],
      run.model,
      run.artifacts,
    );
    expect(predictions).toHaveLength(6);
    expect(dropped).toBe(6);
  });

  it("drops rows that follow a gap after the stored history", () => {
    expect(() => predictNewRows(newRows("2018-06-01"), run.model, run.artifacts)).toThrow(InsufficientHistoryError);
  });

  it("fails when nothing is predictable", () => {
    const unknown = runTraining({
      rows,
      cutoff: { date: d("2017-07-01") },
      config: { ...config, unseenEntityPolicy: "unknown" },
    });
    expect(() => predictNewRows(newRows("2018-01-01", ["A9"]), unknown.model, unknown.artifacts)).toThrow(
      InsufficientHistoryError,
    );
  });
});

describe("forecastRange", () => {
  it("forecasts every agency × sku for each month in range", () => {
    const { predictions } = forecastRange(
      { startDate: d("2018-01-01"), endDate: d("2018-02-01") },
      run.model,
      run.artifacts,
    );
    expect(predictions).toHaveLength(12);
    expect(new Set(predictions.map((p) => formatDate(p.date)))).toEqual(new Set(["2018-01-01", "2018-02-01"]));
    expect(predictions.every((p) => p.prediction >= 0)).toBe(true);
  });

  it("forecasts the unobserved months before a later start without returning them", () => {
    const later = forecastRange({ startDate: d("2018-06-01"), endDate: d("2018-06-01") }, run.model, run.artifacts);
    const contiguous = forecastRange({ startDate: d("2018-01-01"), endDate: d("2018-06-01") }, run.model, run.artifacts);
    expect(later.predictions).toHaveLength(6);
    expect(later.predictions.every((p) => formatDate(p.date) === "2018-06-01")).toBe(true);
    expect(later.predictions).toEqual(contiguous.predictions.filter((p) => formatDate(p.date) === "2018-06-01"));
  });

  it("rejects an inverted range", () => {
    expect(() =>
      forecastRange({ startDate: d("2018-03-01"), endDate: d("2018-01-01") }, run.model, run.artifacts),
    ).toThrow(ConfigurationError);
  });
});

describe("formatPredictionsCsv", () => {
  it("writes date, agency, sku and prediction columns", () => {
    const csv = formatPredictionsCsv([{ date: d("2018-01-01"), agency: "A1", sku: "S1", prediction: 12.5 }]);
    expect(csv).toBe("date,agency,sku,prediction\r\n2018-01-01,A1,S1,12.5");
  });
});

describe("crossValidate", () => {
  it("scores expanding folds", () => {
    const schema = inferSchema(rows, config.exogenousColumns);
    const panel = normalizePanel(rows, schema, { requireTarget: true });
    const folds = crossValidate(panel, schema, config, 2);
    expect(folds.map(({ fold, trainSize, testSize }) => ({ fold, trainSize, testSize }))).toEqual([
      { fold: 1, trainSize: 54, testSize: 72 },
      { fold: 2, trainSize: 126, testSize: 72 },
    ]);
  });
});
