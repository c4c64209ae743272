import type { RequestInitWithSignal } from "./types";
import type { ForecastErrorCode } from "../models/common";
import type { ForecastRequest, ForecastResponse, HealthResponse, StationListResponse } from "../models/forecast";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

export const buildUrl = (baseUrl: string, path: string, query?: Record<string, string | number | undefined>) => {
  const url = new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value === undefined || value === null) return;
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
};

const ERROR_CODES: ForecastErrorCode[] = [
  "bad_request",
  "unknown_station",
  "model_unavailable",
  "data_unavailable",
  "internal_error",
];

export class ForecastApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: ForecastErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ForecastApiError";
  }
}

const readErrorBody = async (response: Response): Promise<{ code: ForecastErrorCode; message: string }> => {
  const fallback = {
    code: "internal_error" as const,
    message: `Forecast API request failed (${response.status})`,
  };
  const body: unknown = await response.json().catch(() => null);
  if (typeof body !== "object" || body === null) return fallback;
  const error = "error" in body ? body.error : undefined;
  const message = "message" in body ? body.message : undefined;
  const code = ERROR_CODES.find((candidate) => candidate === error);
  return {
    code: code ?? fallback.code,
    message: typeof message === "string" ? message : fallback.message,
  };
};

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    const { code, message } = await readErrorBody(response);
    throw new ForecastApiError(response.status, code, message);
  }
  return (await response.json()) as T;
};

export const fetchStations = async (baseUrl: string, init?: RequestInitWithSignal): Promise<StationListResponse> => {
  const url = buildUrl(baseUrl, "/api/stations");
  const response = await fetch(url, { ...init });
  return handleJson<StationListResponse>(response);
};

export const fetchForecast = async (
  baseUrl: string,
  params: ForecastRequest,
  init?: RequestInitWithSignal,
): Promise<ForecastResponse> => {
  const url = buildUrl(baseUrl, "/api/forecast", {
    station: params.station,
    date: params.date,
    hour: params.hour,
  });
  const response = await fetch(url, { ...init });
  return handleJson<ForecastResponse>(response);
};

export const fetchHealth = async (baseUrl: string, init?: RequestInitWithSignal): Promise<HealthResponse> => {
  const url = buildUrl(baseUrl, "/api/health");
  const response = await fetch(url, { ...init });
  return handleJson<HealthResponse>(response);
};
