import { BLOB_PATHS, CONTAINERS, type CleanTable, type FeatureRow } from "../models/tables";
import type { ObjectStore } from "../storage/objectStore";
import { decodeCsv, encodeCleanTable, encodeFeatureTable } from "../storage/tableCodec";
import { logger } from "../utils/logger";
import { aggregate, normalize } from "./transform";

export interface EtlDependencies {
  store: ObjectStore;
}

export interface EtlSummary {
  silverRows: number;
  silverColumns: CleanTable["columns"];
  goldRows: number;
}

/** Phase 1: bronze → silver. Resolves only once the silver object is written. */
export const writeSilver = async ({ store }: EtlDependencies): Promise<CleanTable> => {
  logger.info("Reading bronze data", { object: `${CONTAINERS.bronze}/${BLOB_PATHS.raw}`, store: store.name });
  const raw = decodeCsv(await store.get(CONTAINERS.bronze, BLOB_PATHS.raw));
  const silver = normalize(raw);
  const encoded = await encodeCleanTable(silver);
  logger.info("Writing silver data", { rows: silver.rows.length, columns: silver.columns });
  await store.put(CONTAINERS.silver, BLOB_PATHS.clean, encoded);
  return silver;
};

/** Phase 2: the silver table returned by phase 1 → gold. */
export const writeGold = async ({ store }: EtlDependencies, silver: CleanTable): Promise<FeatureRow[]> => {
  logger.info("Creating gold features");
  const gold = aggregate(silver);
  const encoded = await encodeFeatureTable(gold);
  logger.info("Writing gold data", { rows: gold.length });
  await store.put(CONTAINERS.gold, BLOB_PATHS.features, encoded);
  return gold;
};

export const runEtl = async (deps: EtlDependencies): Promise<EtlSummary> => {
  const silver = await writeSilver(deps);
  const gold = await writeGold(deps, silver);
  return {
    silverRows: silver.rows.length,
    silverColumns: silver.columns,
    goldRows: gold.length,
  };
};
