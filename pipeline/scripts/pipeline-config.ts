import "dotenv/config";
import { ConfigurationError } from "../utils/errors.js";
import { isIsoDate } from "../utils/calendar.js";

// ---------------------------------------------------------------------------
// Environment parsing helpers
// ---------------------------------------------------------------------------

type Environment = Record<string, string | undefined>;

export const readStringSetting = (
  env: Environment,
  name: string,
  fallback: string
): string => env[name]?.trim() || fallback;

export const readPositiveNumberSetting = (
  env: Environment,
  name: string,
  fallback: number
): number => {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number (got "${raw}")`);
  }

  return value;
};

export const readIsoDateSetting = (
  env: Environment,
  name: string,
  fallback: string
): string => {
  const value = readStringSetting(env, name, fallback);
  if (!isIsoDate(value)) {
    throw new ConfigurationError(`${name} must be a yyyy-MM-dd date (got "${value}")`);
  }

  return value;
};

// ---------------------------------------------------------------------------
// Environment configuration
// ---------------------------------------------------------------------------

export const ARCHIVE_API_URL = readStringSetting(
  process.env,
  "ARCHIVE_API_URL",
  "https://archive-api.open-meteo.com/v1/archive"
);
export const ARCHIVE_TIMEZONE = readStringSetting(
  process.env,
  "ARCHIVE_TIMEZONE",
  "Asia/Ho_Chi_Minh"
);
export const EPOCH_START_DATE = readIsoDateSetting(
  process.env,
  "EPOCH_START_DATE",
  "2000-01-01"
);
export const MAX_FETCH_ATTEMPTS = Math.floor(
  readPositiveNumberSetting(process.env, "MAX_FETCH_ATTEMPTS", 6)
);
export const REQUEST_TIMEOUT_MS = readPositiveNumberSetting(
  process.env,
  "REQUEST_TIMEOUT_MS",
  120_000
);
export const DATASET_PATH = readStringSetting(
  process.env,
  "DATASET_PATH",
  "data/lakehouse/weather.csv"
);
export const REGIONS_PATH = readStringSetting(
  process.env,
  "REGIONS_PATH",
  "data/location/regions.csv"
);
export const DATASET_TABLE = readStringSetting(process.env, "DATASET_TABLE", "weather_data");
export const NOMINATIM_BASE_URL = readStringSetting(
  process.env,
  "NOMINATIM_BASE_URL",
  "https://nominatim.openstreetmap.org"
);
export const POLITENESS_DELAY_SCALE = readPositiveNumberSetting(
  process.env,
  "POLITENESS_DELAY_SCALE",
  1
);

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

/** EX_TEMPFAIL: the crawl paused on persistent throttling; rerun later. */
export const EXIT_CODE_RERUN_LATER = 75;
export const EXIT_CODE_FAILURE = 1;
