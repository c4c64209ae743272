import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ParquetReader, ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
  FEATURE_COLUMNS,
  type CleanColumn,
  type CleanTable,
  type FeatureRow,
  type RawTable,
} from "../models/tables";
import { SchemaError, safeErrorMessage } from "../utils/errors";

type SchemaDefinition = ConstructorParameters<typeof ParquetSchema>[0];
type ParquetRow = Record<string, string | number | null>;

const csvRowsSchema = z.array(z.array(z.string()));

/** Decodes a bronze CSV blob. The first record is the header. */
export const decodeCsv = (data: Buffer): RawTable => {
  let records: unknown;
  try {
    records = parse(data, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new SchemaError(`Bronze CSV could not be parsed: ${safeErrorMessage(error)}`, { cause: error });
  }
  const rows = csvRowsSchema.parse(records);
  const [header, ...body] = rows;
  return { columns: header ?? [], rows: body };
};

const utf8 = { type: "UTF8", optional: true } as const;
const double = { type: "DOUBLE", optional: true } as const;
const int32 = { type: "INT32", optional: true } as const;

const CLEAN_FIELDS: Record<CleanColumn, typeof utf8 | typeof double | typeof int32> = {
  transit_timestamp: utf8,
  station_complex: utf8,
  borough: utf8,
  ridership: double,
  latitude: double,
  longitude: double,
  date: utf8,
  hour: int32,
  day_of_week: int32,
};

const FEATURE_SCHEMA: SchemaDefinition = {
  station_complex: { type: "UTF8" },
  borough: { type: "UTF8" },
  latitude: { type: "DOUBLE" },
  longitude: { type: "DOUBLE" },
  hour: { type: "INT32" },
  day_of_week: { type: "INT32" },
  avg_ridership: { type: "DOUBLE" },
};

const writeParquet = async (definition: SchemaDefinition, rows: ParquetRow[]): Promise<Buffer> => {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "ridership-parquet-"));
  const filePath = path.join(tempDir, "table.parquet");
  try {
    const writer = await ParquetWriter.openFile(new ParquetSchema(definition), filePath);
    for (const row of rows) {
      await writer.appendRow(row);
    }
    await writer.close();
    return await fs.readFile(filePath);
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
};

const readParquet = async (data: Buffer): Promise<unknown[]> => {
  const reader = await ParquetReader.openBuffer(data);
  try {
    const cursor = reader.getCursor();
    const records: unknown[] = [];
    let record: unknown = await cursor.next();
    while (record !== null && record !== undefined) {
      records.push(record);
      record = await cursor.next();
    }
    return records;
  } finally {
    await reader.close();
  }
};

export const encodeCleanTable = async (table: CleanTable): Promise<Buffer> => {
  if (table.columns.length === 0) {
    throw new SchemaError("Silver table has no columns; none of the expected source columns were present");
  }
  const definition: SchemaDefinition = Object.fromEntries(
    table.columns.map((column) => [column, CLEAN_FIELDS[column]]),
  );
  const rows = table.rows.map((record) => {
    const row: ParquetRow = {};
    table.columns.forEach((column) => {
      row[column] = record[column] ?? null;
    });
    return row;
  });
  return writeParquet(definition, rows);
};

const featureRowSchema = z.object({
  station_complex: z.string(),
  borough: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  hour: z.number().int().min(0).max(23),
  day_of_week: z.number().int().min(0).max(6),
  avg_ridership: z.number(),
});

export const encodeFeatureTable = async (rows: FeatureRow[]): Promise<Buffer> =>
  writeParquet(
    FEATURE_SCHEMA,
    rows.map((row) => Object.fromEntries(FEATURE_COLUMNS.map((column) => [column, row[column]]))),
  );

export const decodeFeatureTable = async (data: Buffer): Promise<FeatureRow[]> => {
  let records: unknown[];
  try {
    records = await readParquet(data);
  } catch (error) {
    throw new SchemaError(`Gold feature table could not be decoded: ${safeErrorMessage(error)}`, { cause: error });
  }
  const parsed = z.array(featureRowSchema).safeParse(records);
  if (!parsed.success) {
    throw new SchemaError(`Gold feature table does not match the feature schema: ${parsed.error.message}`);
  }
  return parsed.data;
};
