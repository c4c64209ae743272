import { BLOB_PATHS, CONTAINERS, type FeatureRow } from "../models/tables";
import type { ObjectStore } from "../storage/objectStore";
import { decodeFeatureTable } from "../storage/tableCodec";
import { TrainingError } from "../utils/errors";
import { logger } from "../utils/logger";
import { saveArtifacts } from "./artifacts";
import { trainForecastModel, type TrainOptions, type TrainingReport, type TrainingRow } from "./forecastModel";
import { encodeStation, fitEncoder, type StationEncoding } from "./stationEncoder";

export interface TrainingDependencies {
  store: ObjectStore;
  artifactDir: string;
  trainOptions?: Partial<TrainOptions>;
}

export interface TrainingSummary extends TrainingReport {
  trainingId: string;
  stations: number;
}

export const toTrainingRows = (features: readonly FeatureRow[], encoder: StationEncoding): TrainingRow[] =>
  features.map((row) => ({
    station_id_encoded: encodeStation(encoder, row.station_complex),
    hour: row.hour,
    day_of_week: row.day_of_week,
    latitude: row.latitude,
    longitude: row.longitude,
    avg_ridership: row.avg_ridership,
  }));

/** Reads gold, fits encoder and model from the same table, and replaces the artifact pair. */
export const runTraining = async ({ store, artifactDir, trainOptions }: TrainingDependencies): Promise<TrainingSummary> => {
  logger.info("Reading gold features", { object: `${CONTAINERS.gold}/${BLOB_PATHS.features}`, store: store.name });
  const features = await decodeFeatureTable(await store.get(CONTAINERS.gold, BLOB_PATHS.features));
  if (features.length === 0) {
    throw new TrainingError("Gold feature table is empty; run the ETL stage first");
  }

  const encoder = fitEncoder(features.map((row) => row.station_complex));
  logger.info("Training random forest regressor", { rows: features.length, stations: encoder.stations.length });
  const { model, report } = trainForecastModel(toTrainingRows(features, encoder), trainOptions);
  logger.info("Model training completed", {
    trainRows: report.trainRows,
    testRows: report.testRows,
    mae: report.meanAbsoluteError === null ? null : Number(report.meanAbsoluteError.toFixed(2)),
  });

  const artifacts = await saveArtifacts(artifactDir, model, encoder);
  return { ...report, trainingId: artifacts.trainingId, stations: encoder.stations.length };
};
