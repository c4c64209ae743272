import path from "node:path";
import { ConfigurationError } from "./utils/errors";
import { normalizeLogLevel, type LogLevel } from "./utils/logger";

const DEFAULT_SOURCE_URL = "https://data.ny.gov/api/views/wujg-7c2s/rows.csv?accessType=DOWNLOAD";
const DEFAULT_FETCH_BYTE_BUDGET = 10 * 1024 * 1024;
const DEFAULT_ARTIFACT_DIR = path.join("artifacts", "models");
const DEFAULT_PORT = 4000;
const DEFAULT_GOLD_CACHE_TTL_MS = 60 * 60 * 1000;

export interface AppConfig {
  storageAccountName: string;
  storageAccountUrl: string;
  sourceUrl: string;
  fetchByteBudget: number;
  artifactDir: string;
  port: number;
  redisUrl: string | undefined;
  goldCacheTtlMs: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

export const buildStorageAccountUrl = (accountName: string) => `https://${accountName}.dfs.core.windows.net`;

/**
 * Builds the configuration every stage receives at construction time.
 * Throws before any I/O happens when the storage account is not set.
 */
export const loadConfig = (env: Env = process.env): AppConfig => {
  const storageAccountName = env.AZURE_STORAGE_ACCOUNT_NAME?.trim();
  if (!storageAccountName) {
    throw new ConfigurationError(
      "AZURE_STORAGE_ACCOUNT_NAME is not set. Export the storage account name before running any stage.",
    );
  }

  return {
    storageAccountName,
    storageAccountUrl: buildStorageAccountUrl(storageAccountName),
    sourceUrl: env.RIDERSHIP_SOURCE_URL ?? DEFAULT_SOURCE_URL,
    fetchByteBudget: Math.floor(parsePositiveNumber(env.FETCH_BYTE_BUDGET, DEFAULT_FETCH_BYTE_BUDGET)),
    artifactDir: path.resolve(env.MODEL_ARTIFACT_DIR ?? DEFAULT_ARTIFACT_DIR),
    port: parsePositiveNumber(env.PORT, DEFAULT_PORT),
    redisUrl: env.REDIS_URL || undefined,
    goldCacheTtlMs: parsePositiveNumber(env.GOLD_CACHE_TTL_MS, DEFAULT_GOLD_CACHE_TTL_MS),
    logLevel: normalizeLogLevel(env.LOG_LEVEL),
  };
};
