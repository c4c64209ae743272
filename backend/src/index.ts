import type { Server } from "node:http";
import dotenv from "dotenv";
import { createApp, listen } from "./app";
import { GoldFeatureCache } from "./cache/goldCache";
import { createRedisManager } from "./cache/redisClient";
import { loadConfig } from "./config";
import { loadArtifacts } from "./forecast/artifacts";
import { ForecastService } from "./services/forecastService";
import { createObjectStore } from "./storage/dataLakeStore";
import { safeErrorMessage } from "./utils/errors";
import { logger, setLogLevel } from "./utils/logger";

dotenv.config();

const start = async () => {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const redis = createRedisManager({ url: config.redisUrl });
  await redis.connect();

  const goldCache = new GoldFeatureCache(createObjectStore(config), config.goldCacheTtlMs, redis);
  const service = new ForecastService({
    goldCache,
    loadArtifacts: () => loadArtifacts(config.artifactDir),
  });
  const app = createApp({ service, storageAccountName: config.storageAccountName, redis });

  let server: Server;
  try {
    server = await listen(app, config.port);
  } catch (error) {
    await redis.disconnect();
    throw error;
  }
  logger.info(`Forecast server listening on http://localhost:${config.port}`);

  const shutdown = () => {
    logger.info("Shutting down server...");
    void redis.disconnect();
    server.close(() => {
      process.exit(0);
    });
  };

  process.on("SIGHUP", () => {
    logger.info("Reloading model artifacts and gold features on next request");
    service.reloadArtifacts().catch((error: unknown) => {
      logger.error("Reload failed", { message: safeErrorMessage(error) });
    });
  });
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
};

start().catch((error: unknown) => {
  logger.error("Forecast server failed to start", { message: safeErrorMessage(error) });
  process.exitCode = 1;
});
