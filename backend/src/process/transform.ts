import {
  DERIVED_TIME_COLUMNS,
  GROUP_KEY_COLUMNS,
  SOURCE_COLUMNS,
  type CleanColumn,
  type CleanRecord,
  type CleanTable,
  type FeatureRow,
  type RawTable,
  type SourceColumn,
} from "../models/tables";
import { SchemaError } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseTransitTimestamp } from "../utils/timestamps";

const AGGREGATION_COLUMNS: CleanColumn[] = [...GROUP_KEY_COLUMNS, "ridership"];

export const normalizeColumnName = (name: string) => name.toLowerCase().replace(/ /g, "_");

/**
 * Allow-list ∩ available columns, in allow-list order. Columns the source
 * does not carry are dropped without error.
 */
export const projectColumns = (available: string[]): SourceColumn[] => {
  const present = new Set(available);
  return SOURCE_COLUMNS.filter((column) => present.has(column));
};

const parseNumericCell = (column: SourceColumn, value: string, rowIndex: number): number | null => {
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new SchemaError(`Column ${column} has non-numeric value "${value}" at row ${rowIndex + 1}`);
  }
  return parsed;
};

const parseTextCell = (value: string): string | null => (value === "" ? null : value);

export const normalize = (raw: RawTable): CleanTable => {
  const normalizedNames = raw.columns.map(normalizeColumnName);
  const sourceIndex = new Map<string, number>();
  normalizedNames.forEach((name, index) => {
    if (sourceIndex.has(name)) {
      logger.warn("Duplicate column after normalization; keeping the first occurrence", { column: name });
      return;
    }
    sourceIndex.set(name, index);
  });

  const projected = projectColumns(normalizedNames);
  const hasTimestamp = projected.includes("transit_timestamp");
  const columns: CleanColumn[] = hasTimestamp ? [...projected, ...DERIVED_TIME_COLUMNS] : [...projected];

  const rows = raw.rows.map((cells, rowIndex) => {
    const record: CleanRecord = {};
    for (const column of projected) {
      const index = sourceIndex.get(column);
      const value = index === undefined ? "" : (cells[index] ?? "");
      switch (column) {
        case "transit_timestamp": {
          if (value.trim() === "") {
            record.transit_timestamp = null;
            record.date = null;
            record.hour = null;
            record.day_of_week = null;
            break;
          }
          const parsed = parseTransitTimestamp(value);
          record.transit_timestamp = parsed.iso;
          record.date = parsed.date;
          record.hour = parsed.hour;
          record.day_of_week = parsed.dayOfWeek;
          break;
        }
        case "ridership":
        case "latitude":
        case "longitude":
          record[column] = parseNumericCell(column, value, rowIndex);
          break;
        case "station_complex":
        case "borough":
          record[column] = parseTextCell(value);
          break;
      }
    }
    return record;
  });

  if (!hasTimestamp) {
    logger.warn("No transit_timestamp column; date, hour and day_of_week were not derived");
  }

  return { columns, rows };
};

interface FeatureGroup {
  station_complex: string;
  borough: string;
  latitude: number;
  longitude: number;
  hour: number;
  day_of_week: number;
  values: number[];
}

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const compareKeys = (a: FeatureRow, b: FeatureRow): number =>
  compareText(a.station_complex, b.station_complex) ||
  compareText(a.borough, b.borough) ||
  a.latitude - b.latitude ||
  a.longitude - b.longitude ||
  a.hour - b.hour ||
  a.day_of_week - b.day_of_week;

const groupKeyOf = (row: Omit<FeatureGroup, "values">) =>
  JSON.stringify(GROUP_KEY_COLUMNS.map((column) => row[column]));

const sumSorted = (values: number[]) => [...values].sort((a, b) => a - b).reduce((total, value) => total + value, 0);

/**
 * Mean ridership per (station, borough, lat, lng, hour, day_of_week).
 * Output is sorted by key and each mean is summed in ascending value order,
 * so any permutation of the input produces identical rows.
 */
export const aggregate = (clean: CleanTable): FeatureRow[] => {
  const available = new Set(clean.columns);
  const missing = AGGREGATION_COLUMNS.filter((column) => !available.has(column));
  if (missing.length > 0) {
    throw new SchemaError(`Cannot aggregate: missing required column(s) ${missing.join(", ")}`);
  }

  const groups = new Map<string, FeatureGroup>();
  let incompleteKeys = 0;

  for (const record of clean.rows) {
    const { station_complex, borough, latitude, longitude, hour, day_of_week, ridership } = record;
    if (
      station_complex == null ||
      borough == null ||
      latitude == null ||
      longitude == null ||
      hour == null ||
      day_of_week == null
    ) {
      incompleteKeys += 1;
      continue;
    }
    const key = { station_complex, borough, latitude, longitude, hour, day_of_week };
    const groupKey = groupKeyOf(key);
    const group: FeatureGroup = groups.get(groupKey) ?? { ...key, values: [] };
    if (ridership != null) {
      group.values.push(ridership);
    }
    groups.set(groupKey, group);
  }

  const features: FeatureRow[] = [];
  let emptyGroups = 0;
  groups.forEach(({ values, ...key }) => {
    if (values.length === 0) {
      emptyGroups += 1;
      return;
    }
    features.push({ ...key, avg_ridership: sumSorted(values) / values.length });
  });

  if (incompleteKeys > 0 || emptyGroups > 0) {
    logger.warn("Rows excluded from aggregation", { incompleteKeys, groupsWithoutRidership: emptyGroups });
  }

  return features.sort(compareKeys);
};
