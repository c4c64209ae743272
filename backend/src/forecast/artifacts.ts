import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ArtifactMissingError, safeErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { deserializeModel, serializeModel, type ForecastModel } from "./forecastModel";
import { deserializeEncoder, serializeEncoder, type StationEncoding } from "./stationEncoder";

export const MODEL_FILE = "ridership_model.json";
export const ENCODER_FILE = "station_encoder.json";

/** Model and encoder are only meaningful together; they share one training id. */
export interface ModelArtifacts {
  trainingId: string;
  trainedAt: string;
  model: ForecastModel;
  encoder: StationEncoding;
}

const envelopeSchema = z.object({
  trainingId: z.string().min(1),
  trainedAt: z.string(),
  payload: z.unknown(),
});

const artifactPaths = (directory: string) => ({
  model: path.join(directory, MODEL_FILE),
  encoder: path.join(directory, ENCODER_FILE),
});

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const saveArtifacts = async (
  directory: string,
  model: ForecastModel,
  encoder: StationEncoding,
): Promise<ModelArtifacts> => {
  const trainingId = randomUUID();
  const trainedAt = new Date().toISOString();
  const paths = artifactPaths(directory);
  await fs.mkdir(directory, { recursive: true });

  const staged: Array<[string, string]> = [
    [paths.model, JSON.stringify({ trainingId, trainedAt, payload: serializeModel(model) })],
    [paths.encoder, JSON.stringify({ trainingId, trainedAt, payload: serializeEncoder(encoder) })],
  ];
  // Both files are fully written before either replaces the previous pair.
  for (const [target, contents] of staged) {
    await fs.writeFile(`${target}.tmp`, contents, "utf-8");
  }
  for (const [target] of staged) {
    await fs.rename(`${target}.tmp`, target);
  }

  logger.info("Model artifacts saved", { directory, trainingId });
  return { trainingId, trainedAt, model, encoder };
};

const readEnvelope = async (filePath: string) => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ArtifactMissingError(`Artifact ${path.basename(filePath)} not found in ${path.dirname(filePath)}; retrain required`);
    }
    throw new ArtifactMissingError(`Artifact ${filePath} could not be read: ${safeErrorMessage(error)}`, { cause: error });
  }
  try {
    return envelopeSchema.parse(JSON.parse(contents));
  } catch (error) {
    throw new ArtifactMissingError(`Artifact ${filePath} is corrupt; retrain required`, { cause: error });
  }
};

export const loadArtifacts = async (directory: string): Promise<ModelArtifacts> => {
  const paths = artifactPaths(directory);
  const modelEnvelope = await readEnvelope(paths.model);
  const encoderEnvelope = await readEnvelope(paths.encoder);

  if (modelEnvelope.trainingId !== encoderEnvelope.trainingId) {
    throw new ArtifactMissingError(
      `Model (${modelEnvelope.trainingId}) and encoder (${encoderEnvelope.trainingId}) come from different training runs; retrain required`,
    );
  }

  try {
    return {
      trainingId: modelEnvelope.trainingId,
      trainedAt: modelEnvelope.trainedAt,
      model: deserializeModel(modelEnvelope.payload),
      encoder: deserializeEncoder(encoderEnvelope.payload),
    };
  } catch (error) {
    throw new ArtifactMissingError(`Model artifacts in ${directory} are invalid: ${safeErrorMessage(error)}`, {
      cause: error,
    });
  }
};
