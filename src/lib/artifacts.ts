// ─── Artifact persistence: model blob + training artifacts, as JSON ─────────

import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { modelParamsSchema } from "./config";
import { encodersFromJSON, encodersToJSON } from "./entity-encoder";
import { ConfigurationError, ParseError } from "./errors";
import { assertColumns, buildArtifacts } from "./feature-pipeline";
import { GradientBoostedRegressor, type TreeNode } from "./gbt-regressor";
import { getLogger } from "./logger";
import { formatDate, parseDate } from "./panel-loader";
import type { TrainingArtifacts } from "./types";

const log = getLogger("artifacts");

// ═══════════════════════════════════════════════════════════════════════════════
// Schemas
// ═══════════════════════════════════════════════════════════════════════════════

const nullableNumber = z.number().nullable();

const artifactsSchema = z.object({
  version: z.literal(1),
  settings: z.object({
    lags: z.array(z.number().int().positive()).min(1),
    rollingWindows: z.array(z.number().int().positive()).min(1),
    aggregateFallback: z.enum(["null", "global_mean"]),
    unseenEntityPolicy: z.enum(["error", "unknown"]),
  }),
  schema: z.object({
    exogenousColumns: z.array(z.string()),
    droppedConstantColumns: z.array(z.string()),
    ignoredColumns: z.array(z.string()),
  }),
  featureColumns: z.array(z.string()),
  statistics: z.object({
    byAgencySkuMonth: z.record(z.number()),
    byAgencySku: z.record(z.number()),
    bySkuMonth: z.record(z.number()),
    globalMean: z.number(),
  }),
  encoders: z.object({ agency: z.array(z.string()), sku: z.array(z.string()) }),
  history: z.array(
    z.object({
      agency: z.string(),
      sku: z.string(),
      date: z.string(),
      volume: nullableNumber,
      exogenous: z.record(nullableNumber),
    }),
  ),
});

type SerializedArtifacts = z.infer<typeof artifactsSchema>;

const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.object({
    leaf: z.boolean(),
    value: z.number(),
    featureIndex: z.number().int().nonnegative().optional(),
    threshold: z.number().optional(),
    left: treeNodeSchema.optional(),
    right: treeNodeSchema.optional(),
  }),
);

const modelSchema = z.object({
  type: z.literal("gbt"),
  params: modelParamsSchema,
  nFeatures: z.number().int().nonnegative(),
  basePrediction: z.number(),
  trees: z.array(treeNodeSchema),
  featureGain: z.array(z.number()),
  trainingLoss: z.array(z.number()),
  validationLoss: z.array(z.number()),
  bestIteration: z.number().int().nonnegative(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// (De)serialization
// ═══════════════════════════════════════════════════════════════════════════════

export function serializeArtifacts(artifacts: TrainingArtifacts): SerializedArtifacts {
  return {
    version: artifacts.version,
    settings: { ...artifacts.settings },
    schema: { ...artifacts.schema },
    featureColumns: [...artifacts.featureColumns],
    statistics: { ...artifacts.statistics },
    encoders: encodersToJSON(artifacts.encoders),
    history: artifacts.history.map((r) => ({ ...r, date: formatDate(r.date), exogenous: { ...r.exogenous } })),
  };
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ParseError(`Invalid ${what}: ${issue.path.join(".") || "root"}: ${issue.message}`);
  }
  return result.data;
}

export function deserializeArtifacts(raw: unknown): TrainingArtifacts {
  const data = parseWith(artifactsSchema, raw, "training artifacts");
  const artifacts = buildArtifacts({
    settings: data.settings,
    schema: data.schema,
    statistics: data.statistics,
    encoders: encodersFromJSON(data.encoders),
    history: data.history.map((r) => ({ ...r, date: parseDate(r.date) })),
  });
  assertColumns(data.featureColumns, artifacts.featureColumns);
  return artifacts;
}

export function deserializeModel(raw: unknown): GradientBoostedRegressor {
  const data = parseWith(modelSchema, raw, "model");
  if (data.featureGain.length !== data.nFeatures) {
    throw new ConfigurationError(`Model has ${data.featureGain.length} gains for ${data.nFeatures} features`);
  }
  return GradientBoostedRegressor.fromJSON(data);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Files
// ═══════════════════════════════════════════════════════════════════════════════

async function writeJson(file: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(value), "utf-8");
}

async function readJson(file: string): Promise<unknown> {
  const text = await readFile(file, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ParseError(`${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export async function saveArtifacts(artifacts: TrainingArtifacts, file: string): Promise<void> {
  await writeJson(file, serializeArtifacts(artifacts));
  log.info("Saved training artifacts", { file, historyRows: artifacts.history.length });
}

export async function loadArtifacts(file: string): Promise<TrainingArtifacts> {
  const artifacts = deserializeArtifacts(await readJson(file));
  log.info("Loaded training artifacts", { file });
  return artifacts;
}

export async function saveModel(model: GradientBoostedRegressor, file: string): Promise<void> {
  await writeJson(file, model.toJSON());
  log.info("Saved model", { file, trees: model.bestIteration });
}

export async function loadModel(file: string): Promise<GradientBoostedRegressor> {
  const model = deserializeModel(await readJson(file));
  log.info("Loaded model", { file });
  return model;
}
