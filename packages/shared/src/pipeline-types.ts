import { z } from "zod";

// ---------------------------------------------------------------------------
// Common envelope for all pipeline stage outputs
// ---------------------------------------------------------------------------

export interface PipelineStageOutput<T> {
  stage: string;
  version: number;
  createdAt: string;
  data: T;
}

// ---------------------------------------------------------------------------
// Domain records
// ---------------------------------------------------------------------------

export interface Region {
  name: string;
  latitude: number;
  longitude: number;
}

export type CellValue = string | number | null;

/**
 * One row of the consolidated dataset. `timestamp` is civil time in the
 * archive timezone, formatted `yyyy-MM-dd HH:mm:ss`; `metrics` is keyed by
 * display column name.
 */
export interface ObservationRecord {
  region: string;
  timestamp: string;
  metrics: Record<string, CellValue>;
}

/** Closed ISO date range `[start, end]` requested for one region. */
export interface FetchWindow {
  start: string;
  end: string;
}

// ---------------------------------------------------------------------------
// Stage: Crawl Weather (run report)
// ---------------------------------------------------------------------------

export type RegionCrawlStatus = "CAUGHT_UP" | "UPDATED" | "NO_NEW_DATA" | "HARD_STOPPED";

export interface RegionCrawlReport {
  region: string;
  status: RegionCrawlStatus;
  resumeDate: string;
  windowsRequested: number;
  windowsSkipped: number;
  rowsFetched: number;
}

export interface CrawlWeatherData {
  outcome: "COMPLETED" | "HARD_STOPPED";
  totalRows: number;
  regions: RegionCrawlReport[];
}

export const crawlWeatherDataSchema: z.ZodType<CrawlWeatherData> = z.object({
  outcome: z.enum(["COMPLETED", "HARD_STOPPED"]),
  totalRows: z.number().int().nonnegative(),
  regions: z.array(
    z.object({
      region: z.string(),
      status: z.enum(["CAUGHT_UP", "UPDATED", "NO_NEW_DATA", "HARD_STOPPED"]),
      resumeDate: z.string(),
      windowsRequested: z.number(),
      windowsSkipped: z.number(),
      rowsFetched: z.number()
    })
  )
});

export const CRAWL_WEATHER_STAGE = "crawl-weather";
export const CRAWL_WEATHER_VERSION = 1;

export type CrawlWeatherOutput = PipelineStageOutput<CrawlWeatherData>;

// ---------------------------------------------------------------------------
// Pipeline paths
// ---------------------------------------------------------------------------

export const PIPELINE_DIRECTORY = "data/pipeline";

export const PIPELINE_PATHS = {
  crawlWeather: `${PIPELINE_DIRECTORY}/crawl-weather.json`
} as const;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const createStageOutput = <T>(
  stage: string,
  version: number,
  data: T
): PipelineStageOutput<T> => ({
  stage,
  version,
  createdAt: new Date().toISOString(),
  data
});
