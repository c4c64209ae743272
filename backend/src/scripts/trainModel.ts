import dotenv from "dotenv";
import { loadConfig } from "../config";
import { runTraining } from "../forecast/trainer";
import { createObjectStore } from "../storage/dataLakeStore";
import { setLogLevel } from "../utils/logger";
import { exitCodeFor, runStage } from "../utils/stage";

dotenv.config();

const main = async () => {
  const result = await runStage("Model training", async () => {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    return runTraining({ store: createObjectStore(config), artifactDir: config.artifactDir });
  });
  process.exitCode = exitCodeFor(result);
};

void main();
