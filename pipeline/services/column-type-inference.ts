import { normalizeTimestamp } from "../utils/calendar.js";

export type SqlColumnType = "NUMERIC" | "TIMESTAMP" | "TEXT";

export const TYPE_SAMPLE_SIZE = 100;

const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const isNumericText = (value: string): boolean => NUMERIC_PATTERN.test(value.trim());

/**
 * Infers a column type from sampled cell text. Empty cells are ignored; a
 * column is NUMERIC when every remaining cell is a number, else TIMESTAMP when
 * every remaining cell is a date or date-time, else TEXT. A column with no
 * non-empty sample is TEXT.
 */
export const inferColumnType = (samples: readonly string[]): SqlColumnType => {
  const present = samples.filter((value) => value.trim() !== "");
  if (!present.length) {
    return "TEXT";
  }

  if (present.every(isNumericText)) {
    return "NUMERIC";
  }

  if (present.every((value) => normalizeTimestamp(value) !== null)) {
    return "TIMESTAMP";
  }

  return "TEXT";
};

export interface ColumnDefinition {
  name: string;
  type: SqlColumnType;
}

/** Types every header column from at most the first 100 data rows. */
export const inferColumnDefinitions = (
  header: readonly string[],
  rows: readonly (readonly string[])[]
): ColumnDefinition[] => {
  const sample = rows.slice(0, TYPE_SAMPLE_SIZE);

  return header.map((name, index) => ({
    name,
    type: inferColumnType(sample.map((row) => row[index] ?? ""))
  }));
};

const quoteIdentifier = (name: string): string => `"${name.replaceAll('"', '""')}"`;

export const buildCreateTableSql = (
  tableName: string,
  columns: readonly ColumnDefinition[]
): string => {
  const definitions = columns.map((column) => `${quoteIdentifier(column.name)} ${column.type}`);
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(tableName)} (${definitions.join(", ")});`;
};
