import type {
  CrowdLevel,
  ForecastCurvePoint,
  ForecastRequest,
  ForecastResponse,
  StationSummary,
} from "@ridership-forecast/core";
import type { GoldFeatureCache } from "../cache/goldCache";
import type { ModelArtifacts } from "../forecast/artifacts";
import { predict, type ModelInputRow } from "../forecast/forecastModel";
import { encodeStation } from "../forecast/stationEncoder";
import type { FeatureRow } from "../models/tables";
import { InvalidRequestError, StationNotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseCalendarDate } from "../utils/timestamps";

const HOURS_IN_DAY = 24;
/** Strict lower bounds: exactly 2000 riders is still "medium". */
const CROWD_LEVEL_THRESHOLDS = { high: 2000, medium: 500 } as const;

export const classifyCrowdLevel = (predictedRidership: number): CrowdLevel => {
  if (predictedRidership > CROWD_LEVEL_THRESHOLDS.high) return "high";
  if (predictedRidership > CROWD_LEVEL_THRESHOLDS.medium) return "medium";
  return "low";
};

export type ArtifactLoader = () => Promise<ModelArtifacts>;

export interface ForecastServiceDependencies {
  goldCache: GoldFeatureCache;
  loadArtifacts: ArtifactLoader;
}

export const buildStationSummaries = (features: readonly FeatureRow[]): StationSummary[] => {
  const byStation = new Map<string, StationSummary>();
  for (const row of features) {
    if (byStation.has(row.station_complex)) continue;
    byStation.set(row.station_complex, {
      station: row.station_complex,
      borough: row.borough,
      latitude: row.latitude,
      longitude: row.longitude,
    });
  }
  return Array.from(byStation.values());
};

export class ForecastService {
  private readonly goldCache: GoldFeatureCache;
  private readonly loadArtifacts: ArtifactLoader;
  private artifacts?: ModelArtifacts;

  constructor(deps: ForecastServiceDependencies) {
    this.goldCache = deps.goldCache;
    this.loadArtifacts = deps.loadArtifacts;
  }

  /** Failed loads are not cached, so a completed retrain is picked up on the next call. */
  private async getArtifacts(): Promise<ModelArtifacts> {
    if (this.artifacts) return this.artifacts;
    const artifacts = await this.loadArtifacts();
    logger.info("Loaded model artifacts", { trainingId: artifacts.trainingId, trainedAt: artifacts.trainedAt });
    this.artifacts = artifacts;
    return artifacts;
  }

  async reloadArtifacts() {
    this.artifacts = undefined;
    await this.goldCache.invalidate();
  }

  async listStations(): Promise<StationSummary[]> {
    return buildStationSummaries(await this.goldCache.getFeatures());
  }

  async forecast(request: ForecastRequest): Promise<ForecastResponse> {
    const calendarDate = parseCalendarDate(request.date);
    if (!calendarDate) {
      throw new InvalidRequestError(`Invalid date "${request.date}"; expected YYYY-MM-DD`);
    }
    if (!Number.isInteger(request.hour) || request.hour < 0 || request.hour >= HOURS_IN_DAY) {
      throw new InvalidRequestError(`Invalid hour ${request.hour}; expected an integer from 0 to 23`);
    }

    const features = await this.goldCache.getFeatures();
    const stationRow = features.find((row) => row.station_complex === request.station);
    if (!stationRow) {
      throw new StationNotFoundError(request.station);
    }

    const { model, encoder, trainingId, trainedAt } = await this.getArtifacts();
    const base = {
      station_id_encoded: encodeStation(encoder, request.station),
      day_of_week: calendarDate.dayOfWeek,
      latitude: stationRow.latitude,
      longitude: stationRow.longitude,
    };

    const pointRow: ModelInputRow = { ...base, hour: request.hour };
    const [predictedRidership = 0] = predict(model, [pointRow]);

    const curveRows: ModelInputRow[] = Array.from({ length: HOURS_IN_DAY }, (_, hour) => ({ ...base, hour }));
    const curve: ForecastCurvePoint[] = predict(model, curveRows).map((value, hour) => ({
      hour,
      predictedRidership: value,
    }));

    return {
      station: request.station,
      borough: stationRow.borough,
      date: calendarDate.date,
      hour: request.hour,
      dayOfWeek: calendarDate.dayOfWeek,
      latitude: stationRow.latitude,
      longitude: stationRow.longitude,
      predictedRidership,
      crowdLevel: classifyCrowdLevel(predictedRidership),
      curve,
      model: { trainingId, trainedAt },
    };
  }

  getGoldFetchedAt() {
    return this.goldCache.getFetchedAt();
  }
}
