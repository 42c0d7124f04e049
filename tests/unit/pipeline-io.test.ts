import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CRAWL_WEATHER_STAGE,
  CRAWL_WEATHER_VERSION,
  createStageOutput,
  crawlWeatherDataSchema,
  type CrawlWeatherData
} from "../../packages/shared/src/pipeline-types.js";
import { readPipelineFile, writePipelineFile } from "../../pipeline/scripts/pipeline-io.js";

describe("pipeline-io stage files", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "weather-pipeline-io-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes a stage envelope and reads its data back", () => {
    const filePath = join(tmpDir, "pipeline", "crawl-weather.json");
    const data: CrawlWeatherData = { outcome: "COMPLETED", totalRows: 48, regions: [] };

    writePipelineFile(
      filePath,
      createStageOutput(CRAWL_WEATHER_STAGE, CRAWL_WEATHER_VERSION, data),
      () => {}
    );

    expect(readPipelineFile(filePath, CRAWL_WEATHER_STAGE, CRAWL_WEATHER_VERSION, crawlWeatherDataSchema)).toEqual(
      data
    );
    expect(JSON.parse(readFileSync(filePath, "utf8"))).toMatchObject({
      stage: "crawl-weather",
      version: 1
    });
  });

  it("throws when the stage file does not exist", () => {
    expect(() =>
      readPipelineFile(join(tmpDir, "absent.json"), CRAWL_WEATHER_STAGE, 1, crawlWeatherDataSchema)
    ).toThrow("Pipeline file not found");
  });

  it("throws on a stage or version mismatch", () => {
    const filePath = join(tmpDir, "stage.json");
    writeFileSync(filePath, JSON.stringify({ stage: "other", version: 1, createdAt: "2024-03-11T00:00:00.000Z", data: {} }));
    expect(() => readPipelineFile(filePath, CRAWL_WEATHER_STAGE, 1, crawlWeatherDataSchema)).toThrow(
      'has stage "other" but expected "crawl-weather"'
    );

    writeFileSync(filePath, JSON.stringify({ stage: CRAWL_WEATHER_STAGE, version: 99, createdAt: "2024-03-11T00:00:00.000Z", data: {} }));
    expect(() => readPipelineFile(filePath, CRAWL_WEATHER_STAGE, 1, crawlWeatherDataSchema)).toThrow(
      "has version 99 but expected 1"
    );
  });

  it("throws when the data fails validation", () => {
    const filePath = join(tmpDir, "stage.json");
    writeFileSync(filePath, JSON.stringify({ stage: CRAWL_WEATHER_STAGE, version: 1, createdAt: "2024-03-11T00:00:00.000Z", data: 7 }));

    expect(() => readPipelineFile(filePath, CRAWL_WEATHER_STAGE, 1, crawlWeatherDataSchema)).toThrow(
      "invalid data field"
    );
  });
});
