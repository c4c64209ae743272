export type PipelineErrorKind =
  | "configuration"
  | "transport"
  | "schema"
  | "vocabulary"
  | "artifact_missing"
  | "station_not_found"
  | "storage"
  | "training"
  | "invalid_request";

/**
 * Base class for every failure a stage or the forecast service reports.
 * `kind` lets callers branch without `instanceof` chains.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {
  readonly kind = "configuration";
}

export class TransportError extends PipelineError {
  readonly kind = "transport";

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class SchemaError extends PipelineError {
  readonly kind = "schema";
}

export class VocabularyError extends PipelineError {
  readonly kind = "vocabulary";

  constructor(public readonly station: string | number) {
    super(
      typeof station === "string"
        ? `Unknown station "${station}": not part of the trained vocabulary`
        : `Station id ${station} is outside the trained vocabulary`,
    );
  }
}

export class ArtifactMissingError extends PipelineError {
  readonly kind = "artifact_missing";
}

export class StationNotFoundError extends PipelineError {
  readonly kind = "station_not_found";

  constructor(public readonly station: string) {
    super(`Station "${station}" has no row in the gold feature table`);
  }
}

export class StorageError extends PipelineError {
  readonly kind = "storage";
}

export class TrainingError extends PipelineError {
  readonly kind = "training";
}

export class InvalidRequestError extends PipelineError {
  readonly kind = "invalid_request";
}

export const isPipelineError = (error: unknown): error is PipelineError => error instanceof PipelineError;

export const safeErrorMessage = (error: unknown) => {
  if (error instanceof Error) return error.message;
  return JSON.stringify(error);
};
