import { createClient } from "redis";
import { safeErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export type RedisStatus = "disabled" | "idle" | "connecting" | "ready" | "error";

export interface RedisManagerOptions {
  url: string | undefined;
  /** Prepended to every key so several deployments can share one Redis. */
  keyPrefix?: string;
}

export interface RedisManager {
  readonly status: RedisStatus;
  readonly error: Error | undefined;
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  getJson: (key: string) => Promise<unknown>;
  setJson: (key: string, value: unknown, ttlMs?: number) => Promise<void>;
  deleteKey: (key: string) => Promise<void>;
}

export const DEFAULT_KEY_PREFIX = "ridership:cache:";

const NOOP_REDIS_MANAGER: RedisManager = {
  status: "disabled",
  error: undefined,
  connect: async () => undefined,
  disconnect: async () => undefined,
  getJson: async () => null,
  setJson: async () => undefined,
  deleteKey: async () => undefined,
};

const toError = (error: unknown) => (error instanceof Error ? error : new Error(safeErrorMessage(error)));

/**
 * Optional Redis mirror. Every read and write is best effort: while the
 * connection is not ready reads miss and writes are skipped, and command
 * failures are logged rather than thrown.
 */
export const createRedisManager = ({ url, keyPrefix = DEFAULT_KEY_PREFIX }: RedisManagerOptions): RedisManager => {
  if (!url) {
    logger.info("REDIS_URL not set; gold features are cached in memory only");
    return NOOP_REDIS_MANAGER;
  }

  const client = createClient({ url });
  let status: RedisStatus = "idle";
  let lastError: Error | undefined;
  const keyFor = (key: string) => `${keyPrefix}${key}`;

  client.on("ready", () => {
    status = "ready";
    lastError = undefined;
    logger.info("Redis ready", { keyPrefix });
  });
  client.on("reconnecting", () => {
    status = "connecting";
    logger.warn("Redis reconnecting");
  });
  client.on("end", () => {
    status = "disabled";
  });
  client.on("error", (error: unknown) => {
    status = "error";
    lastError = toError(error);
    logger.error("Redis connection error", { message: lastError.message });
  });

  const runCommand = async <T>(command: string, key: string, run: () => Promise<T>): Promise<T | undefined> => {
    if (status !== "ready") return undefined;
    try {
      return await run();
    } catch (error) {
      logger.warn(`Redis ${command} failed`, { key: keyFor(key), message: safeErrorMessage(error) });
      return undefined;
    }
  };

  return {
    get status() {
      return status;
    },
    get error() {
      return lastError;
    },
    connect: async () => {
      if (status === "ready" || status === "connecting") return;
      status = "connecting";
      try {
        await client.connect();
      } catch (error) {
        status = "error";
        lastError = toError(error);
        logger.error("Failed to connect to Redis; continuing without the mirror", { message: lastError.message });
      }
    },
    disconnect: async () => {
      if (status !== "ready") return;
      try {
        await client.quit();
      } catch (error) {
        logger.warn("Failed to close Redis connection", { message: safeErrorMessage(error) });
      }
    },
    getJson: async (key) => {
      const payload = await runCommand("GET", key, () => client.get(keyFor(key)));
      if (!payload) return null;
      try {
        return JSON.parse(payload);
      } catch (error) {
        logger.warn("Discarding unparseable Redis entry", { key: keyFor(key), message: safeErrorMessage(error) });
        return null;
      }
    },
    setJson: async (key, value, ttlMs) => {
      const serialized = JSON.stringify(value);
      await runCommand("SET", key, () =>
        ttlMs && ttlMs > 0 ? client.set(keyFor(key), serialized, { PX: ttlMs }) : client.set(keyFor(key), serialized),
      );
    },
    deleteKey: async (key) => {
      await runCommand("DEL", key, () => client.del(keyFor(key)));
    },
  };
};
