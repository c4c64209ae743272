import { z } from "zod";
import { TrainingError } from "../utils/errors";
import { mulberry32, shuffled } from "../utils/random";
import {
  DEFAULT_FOREST_OPTIONS,
  fitForest,
  predictForest,
  regressionForestSchema,
  type ForestOptions,
  type RegressionForest,
} from "./regressionForest";

export const MODEL_FEATURES = ["station_id_encoded", "hour", "day_of_week", "latitude", "longitude"] as const;

export type ModelFeature = (typeof MODEL_FEATURES)[number];

export type ModelInputRow = Record<ModelFeature, number>;

export interface TrainingRow extends ModelInputRow {
  avg_ridership: number;
}

export interface ForecastModel {
  features: readonly ModelFeature[];
  forest: RegressionForest;
}

export interface TrainingReport {
  trainRows: number;
  testRows: number;
  /** Mean absolute error on the held-out partition; null when nothing was held out. */
  meanAbsoluteError: number | null;
}

export interface TrainOptions {
  testFraction: number;
  splitSeed: number;
  forest: Partial<ForestOptions>;
}

export const DEFAULT_TRAIN_OPTIONS: TrainOptions = {
  testFraction: 0.2,
  splitSeed: 42,
  forest: {},
};

const toVector = (row: ModelInputRow) => MODEL_FEATURES.map((feature) => row[feature]);

export const splitTrainTest = <T>(rows: readonly T[], testFraction: number, seed: number) => {
  const testSize = Math.ceil(rows.length * testFraction);
  const order = shuffled(rows, mulberry32(seed));
  return { test: order.slice(0, testSize), train: order.slice(testSize) };
};

export const meanAbsoluteError = (actual: readonly number[], predicted: readonly number[]): number => {
  if (actual.length === 0) return 0;
  let total = 0;
  actual.forEach((value, index) => {
    total += Math.abs(value - (predicted[index] ?? 0));
  });
  return total / actual.length;
};

/**
 * Fits on a seeded 80% partition and scores the remaining 20%. The error is
 * reported only; it never blocks the model from being returned.
 */
export const trainForecastModel = (
  rows: readonly TrainingRow[],
  overrides: Partial<TrainOptions> = {},
): { model: ForecastModel; report: TrainingReport } => {
  const options = { ...DEFAULT_TRAIN_OPTIONS, ...overrides };
  const { train, test } = splitTrainTest(rows, options.testFraction, options.splitSeed);
  if (train.length === 0) {
    throw new TrainingError(`Not enough feature rows to train (${rows.length} available)`);
  }

  const forest = fitForest(
    train.map(toVector),
    train.map((row) => row.avg_ridership),
    { ...DEFAULT_FOREST_OPTIONS, ...options.forest },
  );
  const model: ForecastModel = { features: MODEL_FEATURES, forest };

  const report: TrainingReport = {
    trainRows: train.length,
    testRows: test.length,
    meanAbsoluteError:
      test.length === 0
        ? null
        : meanAbsoluteError(
            test.map((row) => row.avg_ridership),
            predict(model, test),
          ),
  };
  return { model, report };
};

/** One non-negative prediction per input row, in input order. */
export const predict = (model: ForecastModel, rows: readonly ModelInputRow[]): number[] =>
  predictForest(model.forest, rows.map(toVector)).map((value) => Math.max(0, value));

const serializedModelSchema = z.object({
  features: z.array(z.enum(MODEL_FEATURES)),
  forest: regressionForestSchema,
});

export type SerializedModel = z.infer<typeof serializedModelSchema>;

export const serializeModel = (model: ForecastModel): SerializedModel => ({
  features: [...model.features],
  forest: model.forest,
});

export const deserializeModel = (payload: unknown): ForecastModel => {
  const parsed = serializedModelSchema.parse(payload);
  const matchesFeatureOrder =
    parsed.features.length === MODEL_FEATURES.length &&
    parsed.features.every((feature, index) => feature === MODEL_FEATURES[index]);
  if (!matchesFeatureOrder) {
    throw new Error(`Model was trained on features [${parsed.features.join(", ")}], expected [${MODEL_FEATURES.join(", ")}]`);
  }
  return { features: MODEL_FEATURES, forest: parsed.forest };
};
