import {
  CRAWL_WEATHER_STAGE,
  CRAWL_WEATHER_VERSION,
  createStageOutput,
  type CrawlWeatherData,
  type FetchWindow,
  type Region,
  type RegionCrawlReport
} from "../../packages/shared/src/pipeline-types.js";
import { writePipelineFile } from "../scripts/pipeline-io.js";
import { loadDataset, persistDataset } from "./dataset-store.js";
import {
  crawlRegion,
  drawDelayMs,
  resolveYesterday,
  type DelayRange
} from "./region-crawler.js";
import { sleep, type RetryPolicy, type WindowFetcher } from "./window-retry.js";

export const REGION_DELAY: DelayRange = { minSeconds: 40, maxSeconds: 80 };

export type CrawlSummary =
  | { kind: "COMPLETED"; totalRows: number; regions: RegionCrawlReport[] }
  | {
      kind: "HARD_STOPPED";
      totalRows: number;
      regions: RegionCrawlReport[];
      region: string;
      window: FetchWindow;
    };

export interface CrawlControllerOptions {
  client: WindowFetcher;
  regions: readonly Region[];
  datasetPath: string;
  /** Run report stage file; omitted in tests that only check the dataset. */
  reportPath?: string;
  epochStartDate: string;
  timeZone: string;
  policy?: Partial<RetryPolicy>;
  delayScale?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  log?: (message: string) => void;
}

/**
 * Drives the incremental crawl: one region at a time, persisting after every
 * region that produced rows. A hard stop merges what the stopped region had
 * gathered, persists unconditionally and ends the run.
 */
export class CrawlController {
  private readonly options: CrawlControllerOptions;

  private readonly log: (message: string) => void;

  constructor(options: CrawlControllerOptions) {
    this.options = options;
    this.log = options.log ?? console.log;
  }

  async run(): Promise<CrawlSummary> {
    const { options, log } = this;
    const wait = options.sleep ?? sleep;
    const random = options.random ?? Math.random;
    const now = options.now ?? (() => new Date());

    const dataset = await loadDataset(options.datasetPath, log);
    const yesterday = resolveYesterday(now(), options.timeZone);
    const reports: RegionCrawlReport[] = [];

    log(`[crawl-weather] ${options.regions.length} regions, crawling through ${yesterday}`);

    for (const [index, region] of options.regions.entries()) {
      const result = await crawlRegion(region, dataset.latestTimestamp(region.name), {
        client: options.client,
        epochStartDate: options.epochStartDate,
        yesterday,
        policy: options.policy,
        delayScale: options.delayScale,
        sleep: wait,
        random,
        log
      });

      reports.push(result.report);

      if (result.kind === "HARD_STOPPED") {
        dataset.merge(result.fragments);
        await persistDataset(dataset, options.datasetPath, log);
        log(
          `[crawl-weather] Hard stop on ${region.name} at ${result.window.start} → ${result.window.end}. ` +
            `Progress saved (${dataset.rowCount} rows). Rerun later to resume.`
        );

        const summary: CrawlSummary = {
          kind: "HARD_STOPPED",
          totalRows: dataset.rowCount,
          regions: reports,
          region: region.name,
          window: result.window
        };
        this.writeReport(summary);
        return summary;
      }

      if (result.fragments.length) {
        const stats = dataset.merge(result.fragments);
        log(
          `  ${region.name}: +${stats.inserted} rows (${stats.replaced} replaced, ${stats.dropped} dropped)`
        );
        await persistDataset(dataset, options.datasetPath, log);
      }

      const isLast = index === options.regions.length - 1;
      if (!isLast && result.report.windowsRequested > 0) {
        await wait(drawDelayMs(REGION_DELAY, random, options.delayScale));
      }
    }

    log(`[crawl-weather] Crawl complete. Total rows: ${dataset.rowCount}`);

    const summary: CrawlSummary = {
      kind: "COMPLETED",
      totalRows: dataset.rowCount,
      regions: reports
    };
    this.writeReport(summary);
    return summary;
  }

  private writeReport(summary: CrawlSummary): void {
    if (!this.options.reportPath) {
      return;
    }

    const data: CrawlWeatherData = {
      outcome: summary.kind,
      totalRows: summary.totalRows,
      regions: summary.regions
    };

    writePipelineFile(
      this.options.reportPath,
      createStageOutput(CRAWL_WEATHER_STAGE, CRAWL_WEATHER_VERSION, data),
      this.log
    );
  }
}
