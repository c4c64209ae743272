import type { IsoDate, IsoTimestamp } from "./common";

export interface StationSummary {
  station: string;
  borough: string;
  latitude: number;
  longitude: number;
}

export interface StationListResponse {
  stations: StationSummary[];
}

/** Coarse busyness band for a predicted hourly ridership. */
export type CrowdLevel = "high" | "medium" | "low";

export interface ForecastCurvePoint {
  hour: number;
  predictedRidership: number;
}

export interface ForecastRequest {
  station: string;
  date: IsoDate;
  hour: number;
}

export interface ForecastResponse {
  station: string;
  borough: string;
  date: IsoDate;
  hour: number;
  /** 0 = Monday … 6 = Sunday */
  dayOfWeek: number;
  latitude: number;
  longitude: number;
  predictedRidership: number;
  crowdLevel: CrowdLevel;
  /** 24 points, hour 0 through 23, for the same station and date. */
  curve: ForecastCurvePoint[];
  model: {
    trainingId: string;
    trainedAt: IsoTimestamp;
  };
}

export interface HealthResponse {
  status: "ok";
  timestamp: IsoTimestamp;
  storageAccount: string;
  goldFetchedAt: IsoTimestamp | null;
  redis: {
    status: string;
    healthy: boolean;
  };
}
