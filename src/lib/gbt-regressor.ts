// ─── Gradient Boosted Trees: squared-error boosting over regression trees ───
// Row bagging, per-tree column subsampling, seeded RNG, early stopping on a
// validation pair. Deterministic for a fixed seed.

import type { ModelParams } from "./config";
import { ConfigurationError, InsufficientHistoryError } from "./errors";

// ═══════════════════════════════════════════════════════════════════════════════
// Model contract
// ═══════════════════════════════════════════════════════════════════════════════

export interface ValidationSet {
  X: number[][];
  y: number[];
}

export interface Regressor {
  fit(X: number[][], y: number[], validation?: ValidationSet): this;
  predict(X: number[][]): number[];
  featureImportances(featureNames: readonly string[]): Record<string, number>;
  toJSON(): SerializedGbt;
}

export interface TreeNode {
  leaf: boolean;
  value: number;
  featureIndex?: number;
  threshold?: number;
  left?: TreeNode;
  right?: TreeNode;
}

export interface SerializedGbt {
  type: "gbt";
  params: ModelParams;
  nFeatures: number;
  basePrediction: number;
  trees: TreeNode[];
  featureGain: number[];
  trainingLoss: number[];
  validationLoss: number[];
  bestIteration: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════════

interface Rng { next: () => number; }

function makeRng(seed: number): Rng {
  let s = seed;
  return {
    next: () => { s = (s * 1664525 + 1013904223) >>> 0; return s / 0xffffffff; },
  };
}

function mean(vals: number[]): number {
  if (!vals.length) return 0;
  return vals.reduce((a, b) => a + b, 0) / vals.length;
}

function mse(pred: number[], y: number[]): number {
  return pred.reduce((s, p, i) => s + (p - y[i]) ** 2, 0) / (pred.length || 1);
}

function candidateThresholds(values: number[], maxBins = 16): number[] {
  const sorted = [...new Set(values)].sort((a, b) => a - b);
  if (sorted.length <= 2) return sorted.slice(0, -1);
  const bins = Math.min(maxBins, sorted.length - 1);
  const out: number[] = [];
  for (let i = 1; i <= bins; i++) out.push(sorted[Math.floor((i / (bins + 1)) * sorted.length)]);
  return [...new Set(out)];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Trees
// ═══════════════════════════════════════════════════════════════════════════════

interface GrowOptions {
  maxDepth: number;
  minLeaf: number;
  featureGain: number[];
  colSubset: number[];
}

function buildTreeNode(X: number[][], y: number[], indices: number[], depth: number, opts: GrowOptions): TreeNode {
  const nodeValue = mean(indices.map((i) => y[i]));
  if (depth >= opts.maxDepth || indices.length < opts.minLeaf * 2) return { leaf: true, value: nodeValue };

  const parentSse = indices.reduce((a, i) => a + (y[i] - nodeValue) ** 2, 0);
  // Splits must recover at least 0.5% of the parent SSE
  const minGain = parentSse * 0.005;
  let bestGain = minGain, bestF = -1, bestThr = 0, bestL: number[] = [], bestR: number[] = [];

  for (const f of opts.colSubset) {
    for (const thr of candidateThresholds(indices.map((i) => X[i][f]))) {
      const left: number[] = [], right: number[] = [];
      for (const idx of indices) { if (X[idx][f] <= thr) left.push(idx); else right.push(idx); }
      if (left.length < opts.minLeaf || right.length < opts.minLeaf) continue;
      const lm = mean(left.map((i) => y[i])), rm = mean(right.map((i) => y[i]));
      const gain = parentSse - left.reduce((a, i) => a + (y[i] - lm) ** 2, 0) - right.reduce((a, i) => a + (y[i] - rm) ** 2, 0);
      if (gain > bestGain) { bestGain = gain; bestF = f; bestThr = thr; bestL = left; bestR = right; }
    }
  }

  if (bestF < 0) return { leaf: true, value: nodeValue };
  opts.featureGain[bestF] += bestGain;
  return {
    leaf: false, value: nodeValue, featureIndex: bestF, threshold: bestThr,
    left: buildTreeNode(X, y, bestL, depth + 1, opts),
    right: buildTreeNode(X, y, bestR, depth + 1, opts),
  };
}

export function predictTree(node: TreeNode, x: number[]): number {
  if (node.leaf || node.featureIndex === undefined || node.threshold === undefined || !node.left || !node.right) {
    return node.value;
  }
  return x[node.featureIndex] <= node.threshold ? predictTree(node.left, x) : predictTree(node.right, x);
}

function scaleTree(node: TreeNode, lr: number): void {
  node.value *= lr;
  if (node.left) scaleTree(node.left, lr);
  if (node.right) scaleTree(node.right, lr);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Regressor
// ═══════════════════════════════════════════════════════════════════════════════

export class GradientBoostedRegressor implements Regressor {
  readonly params: ModelParams;
  private trees: TreeNode[] = [];
  private basePrediction = 0;
  private nFeatures = 0;
  private featureGain: number[] = [];
  trainingLoss: number[] = [];
  validationLoss: number[] = [];
  bestIteration = 0;

  constructor(params: ModelParams) {
    this.params = params;
  }

  static fromJSON(json: SerializedGbt): GradientBoostedRegressor {
    const model = new GradientBoostedRegressor(json.params);
    model.trees = json.trees;
    model.basePrediction = json.basePrediction;
    model.nFeatures = json.nFeatures;
    model.featureGain = json.featureGain;
    model.trainingLoss = json.trainingLoss;
    model.validationLoss = json.validationLoss;
    model.bestIteration = json.bestIteration;
    return model;
  }

  fit(X: number[][], y: number[], validation?: ValidationSet): this {
    if (!X.length) throw new InsufficientHistoryError("Cannot fit a model on zero rows");
    if (X.length !== y.length) throw new ConfigurationError(`X has ${X.length} rows but y has ${y.length}`);

    const { nTrees, learningRate, maxDepth, minLeaf, subsample, earlyStoppingRounds, seed } = this.params;
    const rng = makeRng(seed);
    const n = X.length;
    const nFeatures = X[0].length;
    // sqrt(n) features per tree
    const colSubsetSize = Math.min(nFeatures, Math.max(2, Math.ceil(Math.sqrt(nFeatures))));

    this.nFeatures = nFeatures;
    this.basePrediction = mean(y);
    this.trees = [];
    this.trainingLoss = [];
    this.validationLoss = [];

    const predictions = new Array<number>(n).fill(this.basePrediction);
    const residuals = y.map((v) => v - this.basePrediction);
    const valPredictions = validation ? new Array<number>(validation.X.length).fill(this.basePrediction) : [];
    const gainPerTree: number[][] = [];
    let bestLoss = Infinity;
    let bestIteration = 0;

    for (let t = 0; t < nTrees; t++) {
      const bagSize = Math.max(1, Math.floor(n * subsample));
      const bagIdx: number[] = [];
      for (let i = 0; i < bagSize; i++) bagIdx.push(Math.floor(rng.next() * n));

      const allCols = Array.from({ length: nFeatures }, (_, i) => i);
      for (let i = allCols.length - 1; i > 0; i--) { const j = Math.floor(rng.next() * (i + 1)); [allCols[i], allCols[j]] = [allCols[j], allCols[i]]; }

      const featureGain = new Array<number>(nFeatures).fill(0);
      const tree = buildTreeNode(X, residuals, bagIdx, 0, { maxDepth, minLeaf, featureGain, colSubset: allCols.slice(0, colSubsetSize) });
      scaleTree(tree, learningRate);
      this.trees.push(tree);
      gainPerTree.push(featureGain);

      for (let i = 0; i < n; i++) {
        const treePred = predictTree(tree, X[i]);
        residuals[i] -= treePred;
        predictions[i] += treePred;
      }
      this.trainingLoss.push(Math.round(mse(predictions, y) * 10000) / 10000);

      if (!validation) {
        bestIteration = t + 1;
        continue;
      }
      for (let i = 0; i < validation.X.length; i++) valPredictions[i] += predictTree(tree, validation.X[i]);
      const valLoss = mse(valPredictions, validation.y);
      this.validationLoss.push(Math.round(valLoss * 10000) / 10000);
      if (valLoss < bestLoss) { bestLoss = valLoss; bestIteration = t + 1; }
      else if (t + 1 - bestIteration >= earlyStoppingRounds) break;
    }

    this.bestIteration = bestIteration;
    this.trees = this.trees.slice(0, bestIteration);
    this.featureGain = new Array<number>(nFeatures).fill(0);
    for (const gains of gainPerTree.slice(0, bestIteration)) gains.forEach((g, f) => { this.featureGain[f] += g; });
    return this;
  }

  predict(X: number[][]): number[] {
    return X.map((x) => {
      if (x.length !== this.nFeatures) throw new ConfigurationError(`Expected ${this.nFeatures} features, got ${x.length}`);
      let pred = this.basePrediction;
      for (const tree of this.trees) pred += predictTree(tree, x);
      return pred;
    });
  }

  /** Share of total split gain per feature (sums to 1 when any split happened). */
  featureImportances(featureNames: readonly string[]): Record<string, number> {
    if (featureNames.length !== this.featureGain.length) {
      throw new ConfigurationError(`Expected ${this.featureGain.length} feature names, got ${featureNames.length}`);
    }
    const total = this.featureGain.reduce((a, b) => a + b, 0) || 1;
    const out: Record<string, number> = {};
    featureNames.forEach((name, i) => { out[name] = Math.round((this.featureGain[i] / total) * 1000) / 1000; });
    return out;
  }

  toJSON(): SerializedGbt {
    return {
      type: "gbt",
      params: this.params,
      nFeatures: this.nFeatures,
      basePrediction: this.basePrediction,
      trees: this.trees,
      featureGain: this.featureGain,
      trainingLoss: this.trainingLoss,
      validationLoss: this.validationLoss,
      bestIteration: this.bestIteration,
    };
  }
}
