import { describe, expect, it } from "vitest";
import { EmptyPartitionError } from "./errors";
import { applyHistoricalStatistics, fitHistoricalStatistics } from "./historical-aggregates";
import type { PanelRecord } from "./types";
import { d } from "@/test/fixtures";

const rec = (agency: string, sku: string, date: string, volume: number | null): PanelRecord => ({
  agency,
  sku,
  date: d(date),
  volume,
  exogenous: {},
});

const REFERENCE = [
  rec("A", "X", "2017-01-01", 10),
  rec("A", "X", "2017-02-01", 20),
  rec("A", "X", "2018-01-01", 30),
  rec("B", "X", "2017-01-01", 40),
];

describe("fitHistoricalStatistics", () => {
  it("computes grouped means and the global mean", () => {
    const stats = fitHistoricalStatistics(REFERENCE);
    expect(stats.byAgencySkuMonth).toEqual({
      '["A","X",1]': 20,
      '["A","X",2]': 20,
      '["B","X",1]': 40,
    });
    expect(stats.byAgencySku).toEqual({ '["A","X"]': 20, '["B","X"]': 40 });
    expect(stats.bySkuMonth['["X",1]']).toBeCloseTo(80 / 3);
    expect(stats.bySkuMonth['["X",2]']).toBe(20);
    expect(stats.globalMean).toBe(25);
  });

  it("ignores rows without a volume", () => {
    const stats = fitHistoricalStatistics([...REFERENCE, rec("A", "X", "2018-02-01", null)]);
    expect(stats.byAgencySkuMonth['["A","X",2]']).toBe(20);
  });

  it("fails on a reference without volumes", () => {
    expect(() => fitHistoricalStatistics([])).toThrow(EmptyPartitionError);
  });
});

describe("applyHistoricalStatistics", () => {
  const stats = fitHistoricalStatistics(REFERENCE);

  it("joins matched keys", () => {
    const [row] = applyHistoricalStatistics([rec("B", "X", "2019-01-01", 0)], stats, "null");
    expect(row).toEqual({
      mean_volume_agency_sku_month: 40,
      mean_volume_agency_sku: 40,
      mean_volume_sku_month: 80 / 3,
    });
  });

  it("leaves unmatched keys null under the null fallback", () => {
    const [row] = applyHistoricalStatistics([rec("A", "X", "2018-03-01", 5)], stats, "null");
    expect(row).toEqual({
      mean_volume_agency_sku_month: null,
      mean_volume_agency_sku: 20,
      mean_volume_sku_month: null,
    });
  });

  it("imputes the reference global mean under the global_mean fallback", () => {
    const [row] = applyHistoricalStatistics([rec("A", "X", "2018-03-01", 5)], stats, "global_mean");
    expect(row).toEqual({
      mean_volume_agency_sku_month: 25,
      mean_volume_agency_sku: 20,
      mean_volume_sku_month: 25,
    });
  });

  it("does not depend on the volumes of the transformed panel", () => {
    const low = applyHistoricalStatistics([rec("A", "X", "2019-01-01", 1)], stats, "null");
    const high = applyHistoricalStatistics([rec("A", "X", "2019-01-01", 1e6)], stats, "null");
    expect(high).toEqual(low);
  });
});
