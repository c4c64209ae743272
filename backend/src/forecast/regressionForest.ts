import { z } from "zod";
import { mulberry32, randomInt } from "../utils/random";

/**
 * Bagged CART regressors. Each feature is cut into at most `maxBins`
 * candidate thresholds once per forest; nodes pick the threshold that
 * minimizes squared error from per-bin sums.
 */

export type TreeNode =
  | { type: "leaf"; value: number; samples: number }
  | { type: "split"; feature: number; threshold: number; left: TreeNode; right: TreeNode };

export interface ForestOptions {
  nEstimators: number;
  maxDepth: number;
  minSamplesLeaf: number;
  maxBins: number;
  seed: number;
}

export const DEFAULT_FOREST_OPTIONS: ForestOptions = {
  nEstimators: 50,
  maxDepth: 16,
  minSamplesLeaf: 1,
  maxBins: 255,
  seed: 42,
};

export interface RegressionForest {
  featureCount: number;
  trees: TreeNode[];
}

interface BinnedFeatures {
  thresholds: number[][];
  /** bins[feature][sample] */
  bins: Uint16Array[];
}

const MIN_GAIN = 1e-9;

const candidateThresholds = (values: number[], maxBins: number): number[] => {
  const unique = Array.from(new Set(values)).sort((a, b) => a - b);
  if (unique.length < 2) return [];
  const cutCount = Math.min(unique.length - 1, maxBins - 1);
  const thresholds: number[] = [];
  for (let k = 1; k <= cutCount; k++) {
    const position = Math.round((k * (unique.length - 1)) / cutCount);
    const upper = unique[position];
    const lower = unique[position - 1];
    if (upper === undefined || lower === undefined) continue;
    const midpoint = (lower + upper) / 2;
    if (thresholds[thresholds.length - 1] !== midpoint) {
      thresholds.push(midpoint);
    }
  }
  return thresholds;
};

/** Index of the first threshold ≥ value, i.e. the bin `value` falls in. */
const binOf = (thresholds: number[], value: number) => {
  let low = 0;
  let high = thresholds.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    if ((thresholds[mid] ?? Infinity) < value) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
};

const binFeatures = (X: number[][], featureCount: number, maxBins: number): BinnedFeatures => {
  const thresholds: number[][] = [];
  const bins: Uint16Array[] = [];
  for (let feature = 0; feature < featureCount; feature++) {
    const column = X.map((row) => row[feature] ?? 0);
    const cuts = candidateThresholds(column, maxBins);
    thresholds.push(cuts);
    bins.push(Uint16Array.from(column, (value) => binOf(cuts, value)));
  }
  return { thresholds, bins };
};

const meanOf = (y: Float64Array, samples: number[]) => {
  let total = 0;
  for (const sample of samples) total += y[sample] ?? 0;
  return samples.length === 0 ? 0 : total / samples.length;
};

interface SplitCandidate {
  feature: number;
  bin: number;
  score: number;
}

const findBestSplit = (
  binned: BinnedFeatures,
  y: Float64Array,
  samples: number[],
  minSamplesLeaf: number,
): SplitCandidate | null => {
  let total = 0;
  for (const sample of samples) total += y[sample] ?? 0;
  const parentScore = (total * total) / samples.length;

  let best: SplitCandidate | null = null;
  binned.thresholds.forEach((cuts, feature) => {
    if (cuts.length === 0) return;
    const featureBins = binned.bins[feature];
    if (!featureBins) return;
    const counts = new Float64Array(cuts.length + 1);
    const sums = new Float64Array(cuts.length + 1);
    for (const sample of samples) {
      const bin = featureBins[sample] ?? 0;
      counts[bin] = (counts[bin] ?? 0) + 1;
      sums[bin] = (sums[bin] ?? 0) + (y[sample] ?? 0);
    }

    let leftCount = 0;
    let leftSum = 0;
    for (let bin = 0; bin < cuts.length; bin++) {
      leftCount += counts[bin] ?? 0;
      leftSum += sums[bin] ?? 0;
      const rightCount = samples.length - leftCount;
      if (leftCount < minSamplesLeaf) continue;
      if (rightCount < minSamplesLeaf) break;
      const rightSum = total - leftSum;
      // Maximizing this is the same as minimizing the children's squared error.
      const score = (leftSum * leftSum) / leftCount + (rightSum * rightSum) / rightCount;
      if (score - parentScore > MIN_GAIN && (!best || score > best.score)) {
        best = { feature, bin, score };
      }
    }
  });
  return best;
};

const growTree = (
  binned: BinnedFeatures,
  y: Float64Array,
  samples: number[],
  depth: number,
  options: ForestOptions,
): TreeNode => {
  const value = meanOf(y, samples);
  if (depth >= options.maxDepth || samples.length < 2 * options.minSamplesLeaf) {
    return { type: "leaf", value, samples: samples.length };
  }

  const split = findBestSplit(binned, y, samples, options.minSamplesLeaf);
  const featureBins = split ? binned.bins[split.feature] : undefined;
  const threshold = split ? binned.thresholds[split.feature]?.[split.bin] : undefined;
  if (!split || !featureBins || threshold === undefined) {
    return { type: "leaf", value, samples: samples.length };
  }

  const left: number[] = [];
  const right: number[] = [];
  for (const sample of samples) {
    if ((featureBins[sample] ?? 0) <= split.bin) {
      left.push(sample);
    } else {
      right.push(sample);
    }
  }

  return {
    type: "split",
    feature: split.feature,
    threshold,
    left: growTree(binned, y, left, depth + 1, options),
    right: growTree(binned, y, right, depth + 1, options),
  };
};

export const fitForest = (X: number[][], y: number[], overrides: Partial<ForestOptions> = {}): RegressionForest => {
  if (X.length === 0 || X.length !== y.length) {
    throw new Error(`Cannot fit a forest on ${X.length} rows and ${y.length} targets`);
  }
  const options = { ...DEFAULT_FOREST_OPTIONS, ...overrides };
  const featureCount = X[0]?.length ?? 0;
  const binned = binFeatures(X, featureCount, options.maxBins);
  const targets = Float64Array.from(y);
  const rng = mulberry32(options.seed);

  const trees: TreeNode[] = [];
  for (let tree = 0; tree < options.nEstimators; tree++) {
    const bootstrap = Array.from({ length: X.length }, () => randomInt(rng, X.length));
    trees.push(growTree(binned, targets, bootstrap, 0, options));
  }
  return { featureCount, trees };
};

const predictTree = (root: TreeNode, row: readonly number[]) => {
  let node = root;
  while (node.type === "split") {
    node = (row[node.feature] ?? 0) <= node.threshold ? node.left : node.right;
  }
  return node.value;
};

export const predictForest = (forest: RegressionForest, rows: readonly (readonly number[])[]): number[] =>
  rows.map((row) => {
    if (forest.trees.length === 0) return 0;
    let total = 0;
    for (const tree of forest.trees) total += predictTree(tree, row);
    return total / forest.trees.length;
  });

const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal("leaf"), value: z.number(), samples: z.number().int() }),
    z.object({
      type: z.literal("split"),
      feature: z.number().int().min(0),
      threshold: z.number(),
      left: treeNodeSchema,
      right: treeNodeSchema,
    }),
  ]),
);

export const regressionForestSchema = z.object({
  featureCount: z.number().int().min(0),
  trees: z.array(treeNodeSchema),
});
