// ─── CLI: train / predict ───────────────────────────────────────────────────

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { parseArgs } from "util";
import { loadArtifacts, loadModel, saveArtifacts, saveModel } from "@/lib/artifacts";
import { loadConfig } from "@/lib/config";
import { ConfigurationError, describeError } from "@/lib/errors";
import { crossValidate, forecastRange, formatPredictionsCsv, predictNewRows, runTraining } from "@/lib/forecast-engine";
import { getLogger, setLogLevel } from "@/lib/logger";
import { inferSchema, loadPanelCsv, normalizePanel, parseDate } from "@/lib/panel-loader";
import type { Cutoff } from "@/lib/types";

const log = getLogger("cli");

export const USAGE = `Usage:
  train   --data <path> [--test-date <yyyy-MM-dd> | --test-periods <n>]
          [--model-output <path>] [--artifacts-output <path>] [--cv-splits <n>]
  predict (--data <path> | --forecast --start-date <yyyy-MM-dd> --end-date <yyyy-MM-dd>)
          --model <path> --artifacts <path> [--output <path>]`;

export type Command =
  | { kind: "train"; data: string; cutoff: Cutoff; modelOutput: string; artifactsOutput: string; cvSplits: number | null }
  | { kind: "predict"; data: string; model: string; artifacts: string; output: string }
  | { kind: "forecast"; startDate: Date; endDate: Date; model: string; artifacts: string; output: string };

function positiveInt(raw: string, flag: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigurationError(`${flag} must be a positive integer, got "${raw}"`);
  return n;
}

function required(value: string | undefined, flag: string): string {
  if (!value) throw new ConfigurationError(`Missing required option ${flag}\n${USAGE}`);
  return value;
}

export function parseCommand(argv: string[]): Command {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      data: { type: "string" },
      "test-date": { type: "string" },
      "test-periods": { type: "string" },
      "model-output": { type: "string" },
      "artifacts-output": { type: "string" },
      "cv-splits": { type: "string" },
      forecast: { type: "boolean" },
      "start-date": { type: "string" },
      "end-date": { type: "string" },
      model: { type: "string" },
      artifacts: { type: "string" },
      output: { type: "string" },
    },
  });

  const [command] = positionals;
  if (command === "train") {
    if (values["test-date"] && values["test-periods"]) {
      throw new ConfigurationError("Use either --test-date or --test-periods, not both");
    }
    const cutoff: Cutoff = values["test-date"]
      ? { date: parseDate(values["test-date"]) }
      : { periodsBeforeMax: positiveInt(values["test-periods"] ?? "12", "--test-periods") };
    return {
      kind: "train",
      data: required(values.data, "--data"),
      cutoff,
      modelOutput: values["model-output"] ?? "models/model.json",
      artifactsOutput: values["artifacts-output"] ?? "models/artifacts.json",
      cvSplits: values["cv-splits"] ? positiveInt(values["cv-splits"], "--cv-splits") : null,
    };
  }

  if (command === "predict") {
    const shared = {
      model: values.model ?? "models/model.json",
      artifacts: values.artifacts ?? "models/artifacts.json",
      output: values.output ?? "outputs/predictions.csv",
    };
    if (values.forecast) {
      if (values.data) throw new ConfigurationError("Use either --data or --forecast, not both");
      return {
        kind: "forecast",
        startDate: parseDate(required(values["start-date"], "--start-date")),
        endDate: parseDate(required(values["end-date"], "--end-date")),
        ...shared,
      };
    }
    return { kind: "predict", data: required(values.data, "--data"), ...shared };
  }

  throw new ConfigurationError(`Unknown command "${command ?? ""}"\n${USAGE}`);
}

async function execute(command: Command): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (command.kind === "train") {
    const rows = await loadPanelCsv(command.data);
    const run = runTraining({ rows, cutoff: command.cutoff, config });
    if (command.cvSplits) {
      const schema = inferSchema(rows, config.exogenousColumns);
      crossValidate(normalizePanel(rows, schema, { requireTarget: true }), schema, config, command.cvSplits);
    }
    await saveModel(run.model, command.modelOutput);
    await saveArtifacts(run.artifacts, command.artifactsOutput);
    log.info("Training complete", { trainRows: run.trainSize, testRows: run.testSize, mae: run.metrics.mae });
    return;
  }

  const [model, artifacts] = await Promise.all([loadModel(command.model), loadArtifacts(command.artifacts)]);
  const result =
    command.kind === "forecast"
      ? forecastRange({ startDate: command.startDate, endDate: command.endDate }, model, artifacts)
      : predictNewRows(await loadPanelCsv(command.data), model, artifacts);

  await mkdir(path.dirname(command.output), { recursive: true });
  await writeFile(command.output, formatPredictionsCsv(result.predictions), "utf-8");
  log.info("Predictions saved", { output: command.output, rows: result.predictions.length, dropped: result.dropped });
}

/** Returns the process exit code. */
export async function main(argv: string[]): Promise<number> {
  try {
    await execute(parseCommand(argv));
    return 0;
  } catch (err) {
    log.error(describeError(err));
    return 1;
  }
}
