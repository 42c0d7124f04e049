/**
 * Pipeline Stage 3: Describe the consolidated dataset for the bulk loader.
 *
 * Prints the header, the inferred column types and the CREATE TABLE
 * statement, plus the outcome of the last crawl run when its report exists.
 */
import { existsSync } from "node:fs";
import {
  CRAWL_WEATHER_STAGE,
  CRAWL_WEATHER_VERSION,
  crawlWeatherDataSchema,
  PIPELINE_PATHS
} from "../../packages/shared/src/pipeline-types.js";
import {
  buildCreateTableSql,
  inferColumnDefinitions,
  TYPE_SAMPLE_SIZE
} from "../services/column-type-inference.js";
import { readCsvRows } from "../services/dataset-store.js";
import { ConfigurationError } from "../utils/errors.js";
import { DATASET_PATH, DATASET_TABLE, EXIT_CODE_FAILURE } from "./pipeline-config.js";
import { readPipelineFile } from "./pipeline-io.js";

const main = async () => {
  console.log("=== Pipeline: Describe Dataset ===\n");

  if (!existsSync(DATASET_PATH)) {
    throw new ConfigurationError(`Dataset ${DATASET_PATH} not found. Run the crawl-weather stage first.`);
  }

  // Header plus the sampled rows; the rest of the artifact is never read.
  const [header, ...rows] = await readCsvRows(DATASET_PATH, { maxRows: TYPE_SAMPLE_SIZE + 1 });
  if (!header) {
    throw new ConfigurationError(`Dataset ${DATASET_PATH} is empty.`);
  }

  const columns = inferColumnDefinitions(header, rows);
  for (const column of columns) {
    console.log(`  ${column.type.padEnd(9)} ${column.name}`);
  }

  console.log(`\n${buildCreateTableSql(DATASET_TABLE, columns)}\n`);

  if (existsSync(PIPELINE_PATHS.crawlWeather)) {
    const lastRun = readPipelineFile(
      PIPELINE_PATHS.crawlWeather,
      CRAWL_WEATHER_STAGE,
      CRAWL_WEATHER_VERSION,
      crawlWeatherDataSchema
    );
    console.log(
      `[describe-dataset] Last crawl: ${lastRun.outcome}, ${lastRun.totalRows} rows across ${lastRun.regions.length} regions`
    );
  }

  console.log(`\n✓ Describe-dataset complete (${columns.length} columns, ${rows.length} rows sampled)`);
};

main().catch((error: unknown) => {
  console.error("Fatal error in describe-dataset:");
  console.error(error);
  process.exit(EXIT_CODE_FAILURE);
});
