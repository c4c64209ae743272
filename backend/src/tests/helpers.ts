import type { FeatureRow, RawTable } from "../models/tables";
import { setLogLevel } from "../utils/logger";

setLogLevel("error");

export const RAW_HEADER = ["Transit Timestamp", "Station Complex", "Borough", "Ridership", "Latitude", "Longitude"];

export const makeRaw = (rows: string[][], columns: string[] = RAW_HEADER): RawTable => ({ columns, rows });

export const toCsv = (columns: string[], rows: string[][]) =>
  `${[columns, ...rows].map((row) => row.join(",")).join("\n")}\n`;

type FeatureOverrides = Partial<FeatureRow>;

export const makeFeature = (overrides: FeatureOverrides = {}): FeatureRow => ({
  station_complex: "Times Sq",
  borough: "M",
  latitude: 40.75,
  longitude: -73.98,
  hour: 8,
  day_of_week: 0,
  avg_ridership: 150,
  ...overrides,
});

/** Every hour of every weekday for each station; ridership is a step in the hour. */
export const buildStepFeatures = (stations: Array<{ name: string; latitude: number; longitude: number }>) => {
  const rows: FeatureRow[] = [];
  for (const station of stations) {
    for (let day = 0; day < 7; day++) {
      for (let hour = 0; hour < 24; hour++) {
        rows.push({
          station_complex: station.name,
          borough: "M",
          latitude: station.latitude,
          longitude: station.longitude,
          hour,
          day_of_week: day,
          avg_ridership: hour < 12 ? 10 : 100,
        });
      }
    }
  }
  return rows;
};

export const STEP_STATIONS = [
  { name: "Astor Pl", latitude: 40.73, longitude: -73.99 },
  { name: "Bowling Green", latitude: 40.7, longitude: -74.01 },
  { name: "Canal St", latitude: 40.72, longitude: -74.0 },
  { name: "Delancey St", latitude: 40.718, longitude: -73.988 },
  { name: "Times Sq", latitude: 40.75, longitude: -73.98 },
];
