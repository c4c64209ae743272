import test from "node:test";
import assert from "node:assert/strict";
import { aggregate, normalize, normalizeColumnName, projectColumns } from "../process/transform";
import { GROUP_KEY_COLUMNS, type CleanTable } from "../models/tables";
import { SchemaError } from "../utils/errors";
import { mulberry32, shuffled } from "../utils/random";
import { makeRaw } from "./helpers";

test("normalizeColumnName lower-cases and replaces every space", () => {
  assert.equal(normalizeColumnName("Transit Timestamp"), "transit_timestamp");
  assert.equal(normalizeColumnName("Station  Complex"), "station__complex");
  assert.equal(normalizeColumnName("RIDERSHIP"), "ridership");
});

test("projectColumns keeps exactly the allow-list columns that are available", () => {
  assert.deepEqual(projectColumns(["ridership", "payment_method", "station_complex", "georeference"]), [
    "station_complex",
    "ridership",
  ]);
  assert.deepEqual(projectColumns([]), []);
});

test("normalize projects the source columns and derives time fields", () => {
  const raw = makeRaw(
    [["01/01/2024 08:00:00 AM", "Times Sq", "omny", "12", "M"]],
    ["Transit Timestamp", "Station Complex", "Payment Method", "Ridership", "Borough"],
  );
  const clean = normalize(raw);
  assert.deepEqual(clean.columns, [
    "transit_timestamp",
    "station_complex",
    "borough",
    "ridership",
    "date",
    "hour",
    "day_of_week",
  ]);
  assert.deepEqual(clean.rows, [
    {
      transit_timestamp: "2024-01-01T08:00:00",
      station_complex: "Times Sq",
      borough: "M",
      ridership: 12,
      date: "2024-01-01",
      hour: 8,
      day_of_week: 0,
    },
  ]);
});

test("normalize keeps empty cells as null and never drops rows", () => {
  const raw = makeRaw([
    ["2024-01-01 09:00:00", "Canal St", "", "", "40.72", "-74.0"],
    ["2024-01-01 10:00:00", "", "M", "7", "", ""],
  ]);
  const clean = normalize(raw);
  assert.equal(clean.rows.length, 2);
  assert.equal(clean.rows[0]?.borough, null);
  assert.equal(clean.rows[0]?.ridership, null);
  assert.equal(clean.rows[1]?.station_complex, null);
  assert.equal(clean.rows[1]?.latitude, null);
  assert.equal(clean.rows[1]?.ridership, 7);
});

test("an empty timestamp cell is null and the row is excluded from aggregation", () => {
  const clean = normalize(
    makeRaw([
      ["", "Times Sq", "M", "1", "40.75", "-73.98"],
      ["2024-01-01 08:00:00", "Times Sq", "M", "9", "40.75", "-73.98"],
    ]),
  );
  assert.deepEqual(clean.rows[0], {
    transit_timestamp: null,
    date: null,
    hour: null,
    day_of_week: null,
    station_complex: "Times Sq",
    borough: "M",
    ridership: 1,
    latitude: 40.75,
    longitude: -73.98,
  });
  assert.deepEqual(
    aggregate(clean).map((row) => row.avg_ridership),
    [9],
  );
});

test("normalize without a timestamp column produces no derived columns", () => {
  const raw = makeRaw([["Times Sq", "5"]], ["Station Complex", "Ridership"]);
  const clean = normalize(raw);
  assert.deepEqual(clean.columns, ["station_complex", "ridership"]);
  assert.deepEqual(clean.rows, [{ station_complex: "Times Sq", ridership: 5 }]);
});

test("normalize derives hour and weekday within range for every row", () => {
  const rows: string[][] = [];
  for (let day = 1; day <= 14; day++) {
    for (let hour = 0; hour < 24; hour++) {
      const stamp = `2024-02-${String(day).padStart(2, "0")} ${String(hour).padStart(2, "0")}:30:00`;
      rows.push([stamp, "Times Sq", "M", "1", "40.75", "-73.98"]);
    }
  }
  const clean = normalize(makeRaw(rows));
  assert.equal(clean.rows.length, rows.length);
  for (const record of clean.rows) {
    assert.ok(record.hour !== undefined && record.hour >= 0 && record.hour <= 23);
    assert.ok(record.day_of_week !== undefined && record.day_of_week >= 0 && record.day_of_week <= 6);
  }
  assert.equal(new Set(clean.rows.map((record) => record.day_of_week)).size, 7);
});

test("normalize propagates unparseable timestamps and non-numeric counts", () => {
  assert.throws(() => normalize(makeRaw([["soon", "Times Sq", "M", "1", "40.75", "-73.98"]])), SchemaError);
  assert.throws(
    () => normalize(makeRaw([["2024-01-01 08:00:00", "Times Sq", "M", "lots", "40.75", "-73.98"]])),
    (error: unknown) => error instanceof SchemaError && error.message.includes("ridership"),
  );
});

test("aggregate averages ridership for rows sharing a station and time bucket", () => {
  const clean = normalize(
    makeRaw([
      ["2024-01-01 08:15:00", "Times Sq", "M", "100", "40.75", "-73.98"],
      ["2024-01-01 08:45:00", "Times Sq", "M", "200", "40.75", "-73.98"],
    ]),
  );
  assert.deepEqual(aggregate(clean), [
    {
      station_complex: "Times Sq",
      borough: "M",
      latitude: 40.75,
      longitude: -73.98,
      hour: 8,
      day_of_week: 0,
      avg_ridership: 150,
    },
  ]);
});

const buildMixedClean = (): CleanTable => {
  const rows: string[][] = [];
  const stations = [
    ["Times Sq", "M", "40.75", "-73.98"],
    ["Atlantic Av", "BK", "40.684", "-73.977"],
    ["Jamaica Center", "Q", "40.702", "-73.801"],
  ];
  let counter = 1;
  for (const [name, borough, lat, lng] of stations) {
    for (let day = 1; day <= 8; day++) {
      for (const hour of ["07", "08", "17"]) {
        for (const minute of ["00", "20", "40"]) {
          counter = (counter * 37) % 101;
          rows.push([
            `2024-01-${String(day).padStart(2, "0")} ${hour}:${minute}:00`,
            name ?? "",
            borough ?? "",
            String(counter + 0.1),
            lat ?? "",
            lng ?? "",
          ]);
        }
      }
    }
  }
  return normalize(makeRaw(rows));
};

test("aggregate output does not depend on input row order", () => {
  const clean = buildMixedClean();
  const baseline = aggregate(clean);
  for (const seed of [1, 7, 99]) {
    const permuted: CleanTable = { columns: clean.columns, rows: shuffled(clean.rows, mulberry32(seed)) };
    assert.deepEqual(aggregate(permuted), baseline);
  }
  assert.deepEqual(aggregate({ columns: clean.columns, rows: [...clean.rows].reverse() }), baseline);
});

test("aggregate emits one row per grouping key", () => {
  const gold = aggregate(buildMixedClean());
  // 3 stations × 7 weekdays (day 8 repeats Monday) × 3 hours
  assert.equal(gold.length, 63);
  const keys = gold.map((row) => JSON.stringify(GROUP_KEY_COLUMNS.map((column) => row[column])));
  assert.equal(new Set(keys).size, gold.length);
});

test("aggregate fails when a grouping column is missing", () => {
  const clean = normalize(makeRaw([["Times Sq", "M", "5", "40.75", "-73.98"]], ["Station Complex", "Borough", "Ridership", "Latitude", "Longitude"]));
  assert.throws(
    () => aggregate(clean),
    (error: unknown) =>
      error instanceof SchemaError && error.message === "Cannot aggregate: missing required column(s) hour, day_of_week",
  );
});

test("aggregate skips rows with incomplete keys and ignores missing ridership values", () => {
  const clean = normalize(
    makeRaw([
      ["2024-01-01 08:00:00", "Times Sq", "M", "10", "40.75", "-73.98"],
      ["2024-01-01 08:30:00", "Times Sq", "M", "", "40.75", "-73.98"],
      ["2024-01-01 08:30:00", "", "M", "500", "40.75", "-73.98"],
      ["2024-01-01 09:00:00", "Canal St", "M", "", "40.72", "-74.0"],
    ]),
  );
  const gold = aggregate(clean);
  assert.equal(gold.length, 1);
  assert.equal(gold[0]?.station_complex, "Times Sq");
  assert.equal(gold[0]?.avg_ridership, 10);
});
