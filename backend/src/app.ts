import type { Server } from "node:http";
import cors from "cors";
import express from "express";
import { z } from "zod";
import type { ForecastErrorCode, ForecastErrorResponse, HealthResponse } from "@ridership-forecast/core";
import type { RedisManager } from "./cache/redisClient";
import type { ForecastService } from "./services/forecastService";
import { isPipelineError, safeErrorMessage } from "./utils/errors";
import { logger } from "./utils/logger";

export interface AppDependencies {
  service: ForecastService;
  storageAccountName: string;
  redis?: RedisManager;
}

const forecastQuerySchema = z.object({
  station: z.string().trim().min(1, "station is required"),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD"),
  hour: z.coerce.number().int().min(0).max(23),
});

export const toErrorResponse = (error: unknown): { status: number; body: ForecastErrorResponse } => {
  const respond = (status: number, code: ForecastErrorCode, message: string) => ({
    status,
    body: { error: code, message },
  });

  if (!isPipelineError(error)) {
    return respond(500, "internal_error", "Unexpected error while building the forecast");
  }
  switch (error.kind) {
    case "invalid_request":
      return respond(400, "bad_request", error.message);
    case "vocabulary":
    case "station_not_found":
      return respond(404, "unknown_station", error.message);
    case "artifact_missing":
      return respond(503, "model_unavailable", `Forecast model unavailable: ${error.message}`);
    case "storage":
    case "schema":
      return respond(503, "data_unavailable", `Gold feature table unavailable: ${error.message}`);
    default:
      return respond(500, "internal_error", error.message);
  }
};

const sendError = (res: express.Response, error: unknown, context: Record<string, unknown>) => {
  const { status, body } = toErrorResponse(error);
  const log = status >= 500 ? logger.error : logger.warn;
  log("Forecast request failed", { ...context, status, kind: body.error, message: safeErrorMessage(error) });
  return res.status(status).json(body);
};

export const createApp = ({ service, storageAccountName, redis }: AppDependencies) => {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    const goldFetchedAt = service.getGoldFetchedAt();
    const redisStatus = redis?.status ?? "disabled";
    const body: HealthResponse = {
      status: "ok",
      timestamp: new Date().toISOString(),
      storageAccount: storageAccountName,
      goldFetchedAt: goldFetchedAt === null ? null : new Date(goldFetchedAt).toISOString(),
      redis: {
        status: redisStatus,
        healthy: redisStatus === "ready" && !redis?.error,
      },
    };
    res.json(body);
  });

  app.get("/api/stations", async (_req, res) => {
    try {
      const stations = await service.listStations();
      return res.json({ stations });
    } catch (error) {
      return sendError(res, error, { route: "stations" });
    }
  });

  app.get("/api/forecast", async (req, res) => {
    const parsed = forecastQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      const body: ForecastErrorResponse = { error: "bad_request", message };
      return res.status(400).json(body);
    }
    try {
      const forecast = await service.forecast(parsed.data);
      return res.json(forecast);
    } catch (error) {
      return sendError(res, error, { route: "forecast", station: parsed.data.station });
    }
  });

  return app;
};

/** Resolves once the server is bound; a bind failure such as EADDRINUSE rejects instead of crashing. */
export const listen = (app: express.Express, port: number) =>
  new Promise<Server>((resolve, reject) => {
    const server = app.listen(port);
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      server.on("error", (error: Error) => {
        logger.error("Forecast server error", { message: error.message });
      });
      resolve(server);
    };
    server.once("error", onError);
    server.once("listening", onListening);
  });
