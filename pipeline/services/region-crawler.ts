import type {
  FetchWindow,
  Region,
  RegionCrawlReport
} from "../../packages/shared/src/pipeline-types.js";
import { addCalendarDays, timestampDate, todayInTimeZone } from "../utils/calendar.js";
import type { ObservationFragment } from "./response-reshaper.js";
import {
  fetchWindowWithRetry,
  sleep,
  type RetryPolicy,
  type WindowFetcher
} from "./window-retry.js";

export const MAX_WINDOW_DAYS = 365;

export interface DelayRange {
  minSeconds: number;
  maxSeconds: number;
}

export const WINDOW_DELAY: DelayRange = { minSeconds: 5, maxSeconds: 10 };

export type RegionCrawlResult =
  | { kind: "COMPLETED"; fragments: ObservationFragment[]; report: RegionCrawlReport }
  | {
      kind: "HARD_STOPPED";
      fragments: ObservationFragment[];
      window: FetchWindow;
      report: RegionCrawlReport;
    };

export interface RegionCrawlOptions {
  client: WindowFetcher;
  epochStartDate: string;
  /** Most recent complete day; the crawl never requests today. */
  yesterday: string;
  policy?: Partial<RetryPolicy>;
  delayScale?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  log?: (message: string) => void;
}

/** Day after the region's latest stored timestamp, or the epoch start date. */
export const computeResumeDate = (
  latestTimestamp: string | null,
  epochStartDate: string
): string => {
  if (!latestTimestamp) {
    return epochStartDate;
  }

  const next = addCalendarDays(timestampDate(latestTimestamp), 1);
  return next < epochStartDate ? epochStartDate : next;
};

export const resolveYesterday = (now: Date, timeZone: string): string =>
  addCalendarDays(todayInTimeZone(now, timeZone), -1);

/** Consecutive windows of at most 365 days covering `[resumeDate, yesterday]`. */
export const planWindows = (resumeDate: string, yesterday: string): FetchWindow[] => {
  const windows: FetchWindow[] = [];

  let start = resumeDate;
  while (start <= yesterday) {
    const cappedEnd = addCalendarDays(start, MAX_WINDOW_DAYS - 1);
    const end = cappedEnd < yesterday ? cappedEnd : yesterday;
    windows.push({ start, end });
    start = addCalendarDays(end, 1);
  }

  return windows;
};

/** Whole milliseconds drawn uniformly from the range, scaled. */
export const drawDelayMs = (range: DelayRange, random: () => number, scale = 1): number =>
  Math.round(
    (range.minSeconds + random() * (range.maxSeconds - range.minSeconds)) * 1000 * scale
  );

export const crawlRegion = async (
  region: Region,
  latestTimestamp: string | null,
  options: RegionCrawlOptions
): Promise<RegionCrawlResult> => {
  const log = options.log ?? console.log;
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;

  const resumeDate = computeResumeDate(latestTimestamp, options.epochStartDate);
  const report: RegionCrawlReport = {
    region: region.name,
    status: "CAUGHT_UP",
    resumeDate,
    windowsRequested: 0,
    windowsSkipped: 0,
    rowsFetched: 0
  };

  const windows = planWindows(resumeDate, options.yesterday);
  if (!windows.length) {
    log(`  ✓ ${region.name}: up to date (last ${latestTimestamp ?? "none"}).`);
    return { kind: "COMPLETED", fragments: [], report };
  }

  log(
    `  → ${region.name}: ${resumeDate} → ${options.yesterday} (${windows.length} window${windows.length === 1 ? "" : "s"})`
  );

  const fragments: ObservationFragment[] = [];

  for (const [index, window] of windows.entries()) {
    if (index > 0) {
      await wait(drawDelayMs(WINDOW_DELAY, random, options.delayScale));
    }

    report.windowsRequested += 1;
    const result = await fetchWindowWithRetry(options.client, region, window, {
      policy: options.policy,
      sleep: wait,
      random,
      log
    });

    if (result.kind === "HARD_STOPPED") {
      report.status = "HARD_STOPPED";
      return { kind: "HARD_STOPPED", fragments, window, report };
    }

    if (result.kind === "SOFT_FAILED") {
      report.windowsSkipped += 1;
      continue;
    }

    report.rowsFetched += result.fragment.records.length;
    log(`    ${window.start} → ${window.end}: ${result.fragment.records.length} rows`);

    if (result.fragment.records.length) {
      fragments.push(result.fragment);
    }
  }

  report.status = report.rowsFetched > 0 ? "UPDATED" : "NO_NEW_DATA";
  return { kind: "COMPLETED", fragments, report };
};
