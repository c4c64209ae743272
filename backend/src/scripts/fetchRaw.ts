import dotenv from "dotenv";
import { loadConfig } from "../config";
import { createRawFetcher } from "../ingest/rawFetcher";
import { createObjectStore } from "../storage/dataLakeStore";
import { setLogLevel } from "../utils/logger";
import { exitCodeFor, runStage } from "../utils/stage";

dotenv.config();

const main = async () => {
  const result = await runStage("Ingestion", async () => {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    const fetcher = createRawFetcher(config, createObjectStore(config));
    return fetcher.fetchToBronze();
  });
  process.exitCode = exitCodeFor(result);
};

void main();
