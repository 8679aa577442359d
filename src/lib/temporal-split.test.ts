import { describe, expect, it } from "vitest";
import { EmptyPartitionError, InsufficientHistoryError } from "./errors";
import { formatDate } from "./panel-loader";
import { resolveCutoff, selectDates, temporalSplit, timeSeriesFolds } from "./temporal-split";
import { d, series } from "@/test/fixtures";

const panel = [
  ...series("A", "X", "2017-01-01", [1, 2, 3, 4, 5, 6]),
  ...series("B", "X", "2017-03-01", [7, 8, 9, 10]),
];

describe("resolveCutoff", () => {
  it("returns an explicit date unchanged", () => {
    expect(resolveCutoff(panel, { date: d("2017-04-15") })).toEqual(d("2017-04-15"));
  });

  it("counts periods back from the latest date", () => {
    expect(formatDate(resolveCutoff(panel, { periodsBeforeMax: 2 }))).toBe("2017-04-01");
  });
});

describe("temporalSplit", () => {
  it("splits on a single global boundary", () => {
    const { train, test, cutoff } = temporalSplit(panel, { date: d("2017-05-01") });
    expect(formatDate(cutoff)).toBe("2017-05-01");
    expect(train.length + test.length).toBe(panel.length);
    expect(train.every((r) => r.date < cutoff)).toBe(true);
    expect(test.every((r) => r.date >= cutoff)).toBe(true);
    expect(test.map((r) => `${r.agency}:${formatDate(r.date)}`)).toEqual([
      "A:2017-05-01",
      "A:2017-06-01",
      "B:2017-05-01",
      "B:2017-06-01",
    ]);
  });

  it("puts rows dated exactly at the cutoff into test", () => {
    const { train } = temporalSplit(panel, { date: d("2017-03-01") });
    expect(train.map((r) => r.volume)).toEqual([1, 2]);
  });

  it("refuses an empty side", () => {
    expect(() => temporalSplit(panel, { date: d("2016-01-01") })).toThrow(EmptyPartitionError);
    expect(() => temporalSplit(panel, { date: d("2018-01-01") })).toThrow(EmptyPartitionError);
  });
});

describe("timeSeriesFolds", () => {
  it("builds expanding folds of equal test size", () => {
    const folds = timeSeriesFolds(panel, 2);
    expect(folds.map((f) => ({ fold: f.fold, train: f.trainDates.map(formatDate), test: f.testDates.map(formatDate) }))).toEqual([
      { fold: 1, train: ["2017-01-01", "2017-02-01"], test: ["2017-03-01", "2017-04-01"] },
      {
        fold: 2,
        train: ["2017-01-01", "2017-02-01", "2017-03-01", "2017-04-01"],
        test: ["2017-05-01", "2017-06-01"],
      },
    ]);
  });

  it("never tests on a date before one it trains on", () => {
    for (const { trainDates, testDates } of timeSeriesFolds(panel, 3)) {
      const lastTrain = Math.max(...trainDates.map((t) => t.getTime()));
      expect(testDates.every((t) => t.getTime() > lastTrain)).toBe(true);
    }
  });

  it("needs more distinct dates than splits", () => {
    expect(() => timeSeriesFolds(panel, 6)).toThrow(InsufficientHistoryError);
  });
});

describe("selectDates", () => {
  it("keeps every entity's rows on the given dates", () => {
    const rows = selectDates(panel, [d("2017-03-01")]);
    expect(rows.map((r) => r.volume)).toEqual([3, 7]);
  });
});
