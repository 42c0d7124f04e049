/**
 * Pipeline Stage 2: Incremental weather crawl.
 *
 * Resumes every region from the day after its latest stored timestamp and
 * merges new rows into data/lakehouse/weather.csv. Builds the region registry
 * first when it does not exist yet. Exits 75 when persistent
 * throttling forced a hard stop: progress is saved, rerun later.
 */
import { PIPELINE_PATHS } from "../../packages/shared/src/pipeline-types.js";
import { ArchiveClient } from "../services/archive-client.js";
import { CrawlController } from "../services/crawl-controller.js";
import { NominatimGeocoder } from "../services/nominatim-geocoder.js";
import { RegionRegistry } from "../services/region-registry.js";
import {
  ARCHIVE_API_URL,
  ARCHIVE_TIMEZONE,
  DATASET_PATH,
  EPOCH_START_DATE,
  EXIT_CODE_FAILURE,
  EXIT_CODE_RERUN_LATER,
  MAX_FETCH_ATTEMPTS,
  NOMINATIM_BASE_URL,
  POLITENESS_DELAY_SCALE,
  REGIONS_PATH,
  REQUEST_TIMEOUT_MS
} from "./pipeline-config.js";

const main = async (): Promise<number> => {
  const startTime = Date.now();
  console.log("=== Pipeline: Crawl Weather Archive ===\n");

  // A fresh checkout geocodes the provinces first; later runs read the cached registry.
  const regions = await new RegionRegistry({
    registryPath: REGIONS_PATH,
    geocoder: new NominatimGeocoder({ baseUrl: NOMINATIM_BASE_URL })
  }).load();

  const client = new ArchiveClient({
    baseUrl: ARCHIVE_API_URL,
    timeZone: ARCHIVE_TIMEZONE,
    timeoutMs: REQUEST_TIMEOUT_MS
  });

  try {
    const controller = new CrawlController({
      client,
      regions,
      datasetPath: DATASET_PATH,
      reportPath: PIPELINE_PATHS.crawlWeather,
      epochStartDate: EPOCH_START_DATE,
      timeZone: ARCHIVE_TIMEZONE,
      policy: { maxAttempts: MAX_FETCH_ATTEMPTS },
      delayScale: POLITENESS_DELAY_SCALE
    });

    const summary = await controller.run();
    const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);

    if (summary.kind === "HARD_STOPPED") {
      console.log(
        `\n⏸ Crawl paused at ${summary.region} (${summary.totalRows} rows saved, ${elapsedSeconds}s). Rerun later to continue.`
      );
      return EXIT_CODE_RERUN_LATER;
    }

    console.log(`\n✓ Crawl-weather complete: ${summary.totalRows} rows (${elapsedSeconds}s)`);
    return 0;
  } finally {
    await client.close();
  }
};

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error("Fatal error in crawl-weather:");
    console.error(error);
    process.exit(EXIT_CODE_FAILURE);
  });
