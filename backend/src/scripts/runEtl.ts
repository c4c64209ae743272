import dotenv from "dotenv";
import { loadConfig } from "../config";
import { runEtl } from "../process/etlPipeline";
import { createObjectStore } from "../storage/dataLakeStore";
import { logger, setLogLevel } from "../utils/logger";
import { exitCodeFor, runStage } from "../utils/stage";

dotenv.config();

const main = async () => {
  const result = await runStage("ETL", async () => {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    const summary = await runEtl({ store: createObjectStore(config) });
    logger.info("ETL summary", { ...summary });
    return summary;
  });
  process.exitCode = exitCodeFor(result);
};

void main();
