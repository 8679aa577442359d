import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { configFromEnv, historyDepth, loadConfig, parseConfig } from "./config";
import { ConfigurationError } from "./errors";

describe("parseConfig", () => {
  it("fills defaults", () => {
    const config = parseConfig();
    expect(config.lags).toEqual([1, 2, 3, 6, 12]);
    expect(config.rollingWindows).toEqual([3, 6, 12]);
    expect(config.aggregateFallback).toBe("null");
    expect(config.unseenEntityPolicy).toBe("error");
    expect(config.model.nTrees).toBe(300);
  });

  it("sorts and deduplicates periods", () => {
    expect(parseConfig({ lags: [12, 1, 3, 1] }).lags).toEqual([1, 3, 12]);
  });

  it("rejects non-positive periods", () => {
    expect(() => parseConfig({ lags: [0] })).toThrow("Invalid configuration: lags.0: Periods must be positive");
  });

  it("rejects unknown policies", () => {
    expect(() => parseConfig({ unseenEntityPolicy: "ignore" })).toThrow(ConfigurationError);
  });
});

describe("configFromEnv", () => {
  it("reads overrides from the environment", () => {
    const config = parseConfig(
      configFromEnv({
        FORECAST_LAGS: "3, 1",
        FORECAST_EXOGENOUS: "price_actual",
        FORECAST_AGGREGATE_FALLBACK: "global_mean",
      }),
    );
    expect(config.lags).toEqual([1, 3]);
    expect(config.exogenousColumns).toEqual(["price_actual"]);
    expect(config.aggregateFallback).toBe("global_mean");
  });

  it("accepts an empty exogenous list", () => {
    expect(configFromEnv({ FORECAST_EXOGENOUS: "" })).toEqual({ exogenousColumns: [] });
  });

  it("rejects malformed numeric lists", () => {
    expect(() => configFromEnv({ FORECAST_ROLLING_WINDOWS: "3,x" })).toThrow(ConfigurationError);
  });
});

describe("loadConfig", () => {
  it("validates the given environment", () => {
    expect(loadConfig({ LOG_LEVEL: "debug" }, "missing.env").logLevel).toBe("debug");
  });

  it("reads the env file beneath the given environment", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "sales-forecast-env-"));
    try {
      const file = path.join(dir, ".env");
      await writeFile(file, "FORECAST_LAGS=4,2\nLOG_LEVEL=warn\n", "utf-8");
      const config = loadConfig({ LOG_LEVEL: "debug" }, file);
      expect(config.lags).toEqual([2, 4]);
      expect(config.logLevel).toBe("debug");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("historyDepth", () => {
  it("is the longest lag or window", () => {
    expect(historyDepth({ lags: [1, 3], rollingWindows: [6] })).toBe(6);
  });
});
