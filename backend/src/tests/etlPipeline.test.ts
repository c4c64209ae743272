import test from "node:test";
import assert from "node:assert/strict";
import { runEtl } from "../process/etlPipeline";
import { BLOB_PATHS, CONTAINERS } from "../models/tables";
import { MemoryObjectStore } from "../storage/memoryStore";
import { ParquetReader } from "@dsnp/parquetjs";
import { decodeFeatureTable, encodeFeatureTable } from "../storage/tableCodec";
import { SchemaError, StorageError } from "../utils/errors";
import { RAW_HEADER, makeFeature, toCsv } from "./helpers";

const SAMPLE_ROWS = [
  ["2024-01-01T08:00:00", "Times Sq", "M", "100", "40.75", "-73.98"],
  ["2024-01-08T08:00:00", "Times Sq", "M", "200", "40.75", "-73.98"],
  ["01/02/2024 05:00:00 PM", "Canal St", "M", "42", "40.72", "-74.0"],
];

const readSilverRecords = async (data: Buffer) => {
  const reader = await ParquetReader.openBuffer(data);
  const cursor = reader.getCursor();
  const records: unknown[] = [];
  let record: unknown = await cursor.next();
  while (record !== null && record !== undefined) {
    records.push(record);
    record = await cursor.next();
  }
  await reader.close();
  return records;
};

const seedBronze = async (store: MemoryObjectStore, csv: string) => {
  await store.put(CONTAINERS.bronze, BLOB_PATHS.raw, Buffer.from(csv));
};

test("runEtl writes silver and then gold from the bronze snapshot", async () => {
  const store = new MemoryObjectStore();
  await seedBronze(store, toCsv([...RAW_HEADER, "Payment Method"], SAMPLE_ROWS.map((row) => [...row, "omny"])));

  const summary = await runEtl({ store });

  assert.deepEqual(summary, {
    silverRows: 3,
    silverColumns: [
      "transit_timestamp",
      "station_complex",
      "borough",
      "ridership",
      "latitude",
      "longitude",
      "date",
      "hour",
      "day_of_week",
    ],
    goldRows: 2,
  });
  assert.deepEqual(store.getWriteLog(), [
    "bronze/ridership_raw.csv",
    "silver/ridership_clean.parquet",
    "gold/ridership_features.parquet",
  ]);

  const silver = await readSilverRecords(await store.get(CONTAINERS.silver, BLOB_PATHS.clean));
  assert.equal(silver.length, 3);
  assert.deepEqual(silver[2], {
    transit_timestamp: "2024-01-02T17:00:00",
    station_complex: "Canal St",
    borough: "M",
    ridership: 42,
    latitude: 40.72,
    longitude: -74,
    date: "2024-01-02",
    hour: 17,
    day_of_week: 1,
  });

  const gold = await decodeFeatureTable(await store.get(CONTAINERS.gold, BLOB_PATHS.features));
  assert.deepEqual(gold, [
    makeFeature({ station_complex: "Canal St", latitude: 40.72, longitude: -74, hour: 17, day_of_week: 1, avg_ridership: 42 }),
    makeFeature({ avg_ridership: 150 }),
  ]);
});

test("runEtl fails with a storage error when bronze is missing", async () => {
  const store = new MemoryObjectStore();
  await assert.rejects(runEtl({ store }), StorageError);
  assert.deepEqual(store.getWriteLog(), []);
});

test("a bronze snapshot without timestamps writes silver but leaves gold untouched", async () => {
  const store = new MemoryObjectStore();
  const previousGold = await encodeFeatureTable([makeFeature()]);
  await store.put(CONTAINERS.gold, BLOB_PATHS.features, previousGold);
  await seedBronze(
    store,
    toCsv(
      ["Station Complex", "Borough", "Ridership", "Latitude", "Longitude"],
      [["Times Sq", "M", "5", "40.75", "-73.98"]],
    ),
  );

  await assert.rejects(runEtl({ store }), (error: unknown) => {
    assert.ok(error instanceof SchemaError);
    assert.equal(error.message, "Cannot aggregate: missing required column(s) hour, day_of_week");
    return true;
  });

  assert.equal(store.has(CONTAINERS.silver, BLOB_PATHS.clean), true);
  assert.deepEqual(await store.get(CONTAINERS.gold, BLOB_PATHS.features), previousGold);
  assert.deepEqual(store.getWriteLog(), [
    "gold/ridership_features.parquet",
    "bronze/ridership_raw.csv",
    "silver/ridership_clean.parquet",
  ]);
});

test("an unparseable timestamp aborts before any write", async () => {
  const store = new MemoryObjectStore();
  await seedBronze(store, toCsv(RAW_HEADER, [["yesterday", "Times Sq", "M", "5", "40.75", "-73.98"]]));

  await assert.rejects(runEtl({ store }), SchemaError);
  assert.equal(store.has(CONTAINERS.silver, BLOB_PATHS.clean), false);
  assert.equal(store.has(CONTAINERS.gold, BLOB_PATHS.features), false);
});
