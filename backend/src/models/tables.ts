export const CONTAINERS = {
  bronze: "bronze",
  silver: "silver",
  gold: "gold",
} as const;

export type Container = (typeof CONTAINERS)[keyof typeof CONTAINERS];

export const BLOB_PATHS = {
  raw: "ridership_raw.csv",
  clean: "ridership_clean.parquet",
  features: "ridership_features.parquet",
} as const;

/** Columns kept from bronze, in output order. Anything else is projected away. */
export const SOURCE_COLUMNS = [
  "transit_timestamp",
  "station_complex",
  "borough",
  "ridership",
  "latitude",
  "longitude",
] as const;

export type SourceColumn = (typeof SOURCE_COLUMNS)[number];

export const DERIVED_TIME_COLUMNS = ["date", "hour", "day_of_week"] as const;

export type DerivedTimeColumn = (typeof DERIVED_TIME_COLUMNS)[number];

export type CleanColumn = SourceColumn | DerivedTimeColumn;

export const GROUP_KEY_COLUMNS = [
  "station_complex",
  "borough",
  "latitude",
  "longitude",
  "hour",
  "day_of_week",
] as const;

export interface RawTable {
  columns: string[];
  rows: string[][];
}

export interface CleanRecord {
  transit_timestamp?: string | null;
  station_complex?: string | null;
  borough?: string | null;
  ridership?: number | null;
  latitude?: number | null;
  longitude?: number | null;
  date?: string | null;
  hour?: number | null;
  day_of_week?: number | null;
}

export interface CleanTable {
  columns: CleanColumn[];
  rows: CleanRecord[];
}

export interface FeatureRow {
  station_complex: string;
  borough: string;
  latitude: number;
  longitude: number;
  hour: number;
  day_of_week: number;
  avg_ridership: number;
}

export const FEATURE_COLUMNS = [...GROUP_KEY_COLUMNS, "avg_ridership"] as const;
