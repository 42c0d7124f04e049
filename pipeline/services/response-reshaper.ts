import type {
  CellValue,
  ObservationRecord
} from "../../packages/shared/src/pipeline-types.js";
import {
  DAILY_VARIABLES,
  HOURLY_VARIABLES,
  TIME_OF_DAY_DAILY_VARIABLES
} from "../constants/weather-variables.js";
import { normalizeTimestamp, timestampDate, toTimeOfDay } from "../utils/calendar.js";
import { orderColumns, unionColumns } from "../utils/column-order.js";
import type { ArchivePayload, ArchiveSeries } from "./archive-client.js";

export interface ObservationFragment {
  /** Metric columns only, in dataset order (region and timestamp excluded). */
  metricColumns: string[];
  records: ObservationRecord[];
}

const toCellValue = (value: unknown): CellValue => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "string") {
    return value;
  }

  return null;
};

const displayName = (mapping: Readonly<Record<string, string>>, metric: string): string =>
  mapping[metric] ?? metric;

const buildDailyLookup = (
  daily: ArchiveSeries
): { columns: string[]; byDate: Map<string, Record<string, CellValue>> } => {
  const metrics = Object.keys(daily.columns);
  const columns = metrics.map((metric) => displayName(DAILY_VARIABLES, metric));
  const byDate = new Map<string, Record<string, CellValue>>();

  daily.time.forEach((time, index) => {
    const timestamp = normalizeTimestamp(time);
    if (!timestamp) {
      return;
    }

    const row: Record<string, CellValue> = {};
    for (const metric of metrics) {
      const raw = daily.columns[metric]?.[index];
      const column = displayName(DAILY_VARIABLES, metric);

      if (TIME_OF_DAY_DAILY_VARIABLES.includes(metric)) {
        row[column] = typeof raw === "string" ? toTimeOfDay(raw) : null;
      } else {
        row[column] = toCellValue(raw);
      }
    }

    byDate.set(timestampDate(timestamp), row);
  });

  return { columns, byDate };
};

/**
 * Flattens one archive response into hourly observation rows for a region.
 * Every hourly row inherits the daily aggregates of its calendar date; an
 * empty hourly series yields no rows.
 */
export const reshapeArchivePayload = (
  payload: ArchivePayload,
  regionName: string
): ObservationFragment => {
  const hourlyMetrics = Object.keys(payload.hourly.columns);
  const metricColumns: string[] = hourlyMetrics.map((metric) =>
    displayName(HOURLY_VARIABLES, metric)
  );

  const daily = payload.daily ? buildDailyLookup(payload.daily) : null;
  if (daily) {
    unionColumns(metricColumns, daily.columns);
  }

  const records: ObservationRecord[] = [];

  payload.hourly.time.forEach((time, index) => {
    const timestamp = normalizeTimestamp(time);
    if (!timestamp) {
      return;
    }

    const metrics: Record<string, CellValue> = {};
    for (const metric of hourlyMetrics) {
      metrics[displayName(HOURLY_VARIABLES, metric)] = toCellValue(
        payload.hourly.columns[metric]?.[index]
      );
    }

    if (daily) {
      const dailyRow = daily.byDate.get(timestampDate(timestamp));
      for (const column of daily.columns) {
        metrics[column] = dailyRow?.[column] ?? null;
      }
    }

    records.push({ region: regionName, timestamp, metrics });
  });

  if (!records.length) {
    return { metricColumns: [], records: [] };
  }

  // orderColumns wraps metrics with region/timestamp; strip them back off.
  return {
    metricColumns: orderColumns(metricColumns).slice(1, -1),
    records
  };
};
