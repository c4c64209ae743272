export type IsoDate = string;
export type IsoTimestamp = string;

export type ForecastErrorCode =
  | "bad_request"
  | "unknown_station"
  | "model_unavailable"
  | "data_unavailable"
  | "internal_error";

export interface ForecastErrorResponse {
  error: ForecastErrorCode;
  message: string;
}
