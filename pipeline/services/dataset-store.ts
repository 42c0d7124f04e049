import { createReadStream, createWriteStream, existsSync, mkdirSync, renameSync, rmSync } from "node:fs";
import { dirname } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { CsvError, parse } from "csv-parse";
import { stringify } from "csv-stringify";
import { z } from "zod";
import type {
  CellValue,
  ObservationRecord
} from "../../packages/shared/src/pipeline-types.js";
import { REGION_COLUMN, TIMESTAMP_COLUMN } from "../constants/weather-variables.js";
import { PersistenceError } from "../utils/errors.js";
import { ConsolidatedDataset } from "./consolidated-dataset.js";

const csvRowSchema = z.array(z.string());

/**
 * Streams a CSV file (UTF-8, optional BOM) row by row. Artifacts can outgrow
 * the largest string V8 will build, so the file is never read whole.
 */
export async function* iterateCsvRows(filePath: string): AsyncGenerator<string[]> {
  const source = createReadStream(filePath);
  const parser = parse({
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  });
  source.on("error", (error) => parser.destroy(error));
  source.pipe(parser);

  try {
    for await (const record of parser) {
      const row = csvRowSchema.safeParse(record);
      if (!row.success) {
        throw new Error(`Unexpected CSV structure in ${filePath}`);
      }

      yield row.data;
    }
  } finally {
    source.destroy();
  }
}

/** Collects CSV rows, stopping after `maxRows` when given. */
export const readCsvRows = async (
  filePath: string,
  options: { maxRows?: number } = {}
): Promise<string[][]> => {
  const rows: string[][] = [];

  for await (const row of iterateCsvRows(filePath)) {
    rows.push(row);
    if (options.maxRows !== undefined && rows.length >= options.maxRows) {
      break;
    }
  }

  return rows;
};

/**
 * Streams rows as UTF-8 CSV with BOM into `<path>.tmp`, then renames it over
 * the target. The previous artifact stays intact until the rename.
 */
export const writeCsvAtomically = async (
  filePath: string,
  rows: Iterable<readonly CellValue[]>
): Promise<void> => {
  const tempPath = `${filePath}.tmp`;

  try {
    mkdirSync(dirname(filePath), { recursive: true });
    await pipeline(Readable.from(rows), stringify({ bom: true }), createWriteStream(tempPath));
    renameSync(tempPath, filePath);
  } catch (error) {
    if (existsSync(tempPath)) {
      rmSync(tempPath, { force: true });
    }
    throw new PersistenceError(filePath, { cause: error });
  }
};

// ---------------------------------------------------------------------------
// Consolidated dataset artifact
// ---------------------------------------------------------------------------

const toRecord = (
  header: readonly string[],
  row: readonly string[],
  regionIndex: number,
  timestampIndex: number
): ObservationRecord => {
  const metrics: Record<string, CellValue> = {};
  header.forEach((column, index) => {
    if (index === regionIndex || index === timestampIndex) {
      return;
    }

    const cell = row[index] ?? "";
    metrics[column] = cell === "" ? null : cell;
  });

  return {
    region: row[regionIndex] ?? "",
    timestamp: row[timestampIndex] ?? "",
    metrics
  };
};

/**
 * Loads the dataset artifact. A missing, unparseable or header-less file
 * loads as empty, which restarts every region from the epoch date.
 */
export const loadDataset = async (
  filePath: string,
  log: (message: string) => void = console.log
): Promise<ConsolidatedDataset> => {
  if (!existsSync(filePath)) {
    log(`  No dataset at ${filePath}; every region starts from the epoch date.`);
    return ConsolidatedDataset.empty();
  }

  let header: string[] | null = null;
  let regionIndex = -1;
  let timestampIndex = -1;
  const records: ObservationRecord[] = [];

  try {
    for await (const row of iterateCsvRows(filePath)) {
      if (header) {
        records.push(toRecord(header, row, regionIndex, timestampIndex));
        continue;
      }

      header = row;
      regionIndex = row.indexOf(REGION_COLUMN);
      timestampIndex = row.indexOf(TIMESTAMP_COLUMN);
      if (regionIndex < 0 || timestampIndex < 0) {
        break;
      }
    }
  } catch (error) {
    if (!(error instanceof CsvError)) {
      throw error;
    }

    log(`  ⚠ Dataset ${filePath} is not valid CSV (${error.message}); crawling from the epoch date.`);
    return ConsolidatedDataset.empty();
  }

  if (!header || regionIndex < 0 || timestampIndex < 0) {
    log(
      `  ⚠ Dataset ${filePath} has no ${REGION_COLUMN}/${TIMESTAMP_COLUMN} columns; crawling from the epoch date.`
    );
    return ConsolidatedDataset.empty();
  }

  const metricColumns = header.filter(
    (column) => column !== REGION_COLUMN && column !== TIMESTAMP_COLUMN
  );
  const dataset = ConsolidatedDataset.fromRecords(metricColumns, records);

  log(`  Loaded ${filePath} (${dataset.rowCount} rows, ${dataset.regions.length} regions)`);
  return dataset;
};

function* datasetRows(dataset: ConsolidatedDataset): Generator<CellValue[]> {
  const columns = dataset.columns;
  yield columns;

  for (const record of dataset.rows) {
    yield columns.map((column) => {
      if (column === REGION_COLUMN) return record.region;
      if (column === TIMESTAMP_COLUMN) return record.timestamp;
      return record.metrics[column] ?? null;
    });
  }
}

export const persistDataset = async (
  dataset: ConsolidatedDataset,
  filePath: string,
  log: (message: string) => void = console.log
): Promise<void> => {
  await writeCsvAtomically(filePath, datasetRows(dataset));
  log(`  Saved ${filePath} (${dataset.rowCount} rows)`);
};
