import {
  CODE_COLUMNS,
  REGION_COLUMN,
  TIMESTAMP_COLUMN
} from "../constants/weather-variables.js";

/**
 * Full dataset header for the given metric columns: region first, the weather
 * code columns next when present, remaining metrics in their given order,
 * timestamp last.
 */
export const orderColumns = (metricColumns: readonly string[]): string[] => {
  const metrics = metricColumns.filter(
    (column) => column !== REGION_COLUMN && column !== TIMESTAMP_COLUMN
  );
  const present = new Set(metrics);
  const codes = CODE_COLUMNS.filter((column) => present.has(column));
  const rest = metrics.filter((column) => !CODE_COLUMNS.includes(column));

  return [REGION_COLUMN, ...codes, ...rest, TIMESTAMP_COLUMN];
};

/** Appends unseen columns to `target`, keeping first-seen order. */
export const unionColumns = (target: string[], columns: readonly string[]): void => {
  const seen = new Set(target);
  for (const column of columns) {
    if (!seen.has(column)) {
      seen.add(column);
      target.push(column);
    }
  }
};
