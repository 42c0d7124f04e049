import { addDays, differenceInCalendarDays, format, isValid, parse } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";

const ISO_DATE_FORMAT = "yyyy-MM-dd";

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;

const TIME_OF_DAY_PATTERN = /(?:^|[T ])(\d{2}):(\d{2})(?::\d{2})?$/;

// Calendar dates are handled as local-midnight Dates so that date-fns day
// arithmetic never crosses a day boundary on DST transitions.
const toLocalDate = (isoDate: string): Date => parse(isoDate, ISO_DATE_FORMAT, new Date(0));

export const isIsoDate = (value: string): boolean =>
  /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(toLocalDate(value));

export const addCalendarDays = (isoDate: string, days: number): string =>
  format(addDays(toLocalDate(isoDate), days), ISO_DATE_FORMAT);

/** Inclusive day count of `[start, end]`. */
export const countCalendarDays = (start: string, end: string): number =>
  differenceInCalendarDays(toLocalDate(end), toLocalDate(start)) + 1;

export const todayInTimeZone = (now: Date, timeZone: string): string =>
  formatInTimeZone(now, timeZone, ISO_DATE_FORMAT);

/**
 * Normalizes archive and dataset timestamps (`2024-01-01T05:00`,
 * `2024-01-01 05:00:00`, `2024-01-01`) to `yyyy-MM-dd HH:mm:ss`.
 * Returns null when the value is not a real calendar timestamp.
 */
export const normalizeTimestamp = (value: string): string | null => {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, datePart = "", hours = "00", minutes = "00", seconds = "00"] = match;
  if (!isIsoDate(datePart)) {
    return null;
  }

  if (Number(hours) > 23 || Number(minutes) > 59 || Number(seconds) > 59) {
    return null;
  }

  return `${datePart} ${hours}:${minutes}:${seconds}`;
};

export const timestampDate = (timestamp: string): string => timestamp.slice(0, 10);

/** `2024-01-01T05:42` → `05:42`; null when no time of day is present. */
export const toTimeOfDay = (value: string): string | null => {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, hours = "", minutes = ""] = match;
  if (Number(hours) > 23 || Number(minutes) > 59) {
    return null;
  }

  return `${hours}:${minutes}`;
};
