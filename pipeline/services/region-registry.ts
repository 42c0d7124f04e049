import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Region } from "../../packages/shared/src/pipeline-types.js";
import { ConfigurationError } from "../utils/errors.js";
import { readCsvRows, writeCsvAtomically } from "./dataset-store.js";
import type { RegionGeocoder } from "./nominatim-geocoder.js";

export const REGISTRY_COLUMNS = ["Region", "lat", "lon"] as const;

export const DEFAULT_PROVINCES_PATH = fileURLToPath(
  new URL("../constants/provinces.json", import.meta.url)
);

const provinceNamesSchema = z.array(z.string().min(1)).nonempty();

export const loadProvinceNames = (filePath: string = DEFAULT_PROVINCES_PATH): string[] => {
  const parsed = provinceNamesSchema.safeParse(JSON.parse(readFileSync(filePath, "utf8")));
  if (!parsed.success) {
    throw new ConfigurationError(`${filePath} must be a JSON array of province names`);
  }

  return parsed.data;
};

const parseCoordinate = (value: string | undefined): number | null => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

export interface RegionRegistryOptions {
  registryPath: string;
  /** Required only when the registry CSV does not exist yet. */
  geocoder?: RegionGeocoder;
  provinceNames?: readonly string[];
  log?: (message: string) => void;
}

/**
 * Ordered list of regions with coordinates, cached as a CSV artifact. Built
 * once through the geocoder; read-only afterwards.
 */
export class RegionRegistry {
  private readonly options: RegionRegistryOptions;

  private readonly log: (message: string) => void;

  constructor(options: RegionRegistryOptions) {
    this.options = options;
    this.log = options.log ?? console.log;
  }

  async load(): Promise<Region[]> {
    if (existsSync(this.options.registryPath)) {
      return this.readRegistry();
    }

    return this.build();
  }

  /** Geocodes every province and writes the registry, replacing any existing file. */
  async build(): Promise<Region[]> {
    const { geocoder, registryPath } = this.options;
    if (!geocoder) {
      throw new ConfigurationError(
        `Region registry ${registryPath} not found and no geocoder is configured. Run "npm run pipeline:regions" first.`
      );
    }

    const names = this.options.provinceNames ?? loadProvinceNames();
    const regions: Region[] = [];

    for (const name of names) {
      const result = await geocoder.geocode(name);

      if (result.latitude === null || result.longitude === null) {
        const reason = result.httpStatus
          ? `HTTP ${result.httpStatus}`
          : result.errorMessage ?? result.outcome;
        this.log(`  ⚠ Could not geocode ${name} (${reason}); omitting it.`);
        continue;
      }

      this.log(`  ${name}: ${result.latitude}, ${result.longitude}`);
      regions.push({ name, latitude: result.latitude, longitude: result.longitude });
    }

    if (!regions.length) {
      throw new ConfigurationError(`Geocoding resolved none of ${names.length} regions.`);
    }

    await writeCsvAtomically(registryPath, [
      [...REGISTRY_COLUMNS],
      ...regions.map((region) => [region.name, region.latitude, region.longitude])
    ]);
    this.log(`  Saved ${registryPath} (${regions.length}/${names.length} regions)`);

    return regions;
  }

  private async readRegistry(): Promise<Region[]> {
    const { registryPath } = this.options;
    const [header, ...body] = await readCsvRows(registryPath);

    const [nameColumn, latitudeColumn, longitudeColumn] = REGISTRY_COLUMNS.map((column) =>
      header ? header.indexOf(column) : -1
    );
    if (
      nameColumn === undefined ||
      latitudeColumn === undefined ||
      longitudeColumn === undefined ||
      nameColumn < 0 ||
      latitudeColumn < 0 ||
      longitudeColumn < 0
    ) {
      throw new ConfigurationError(
        `Region registry ${registryPath} must have columns ${REGISTRY_COLUMNS.join(",")}`
      );
    }

    const regions: Region[] = [];
    for (const row of body) {
      const name = row[nameColumn]?.trim() ?? "";
      const latitude = parseCoordinate(row[latitudeColumn]);
      const longitude = parseCoordinate(row[longitudeColumn]);

      if (!name || latitude === null || longitude === null) {
        this.log(`  ⚠ Skipping malformed registry row: ${row.join(",")}`);
        continue;
      }

      regions.push({ name, latitude, longitude });
    }

    this.log(`  Loaded ${registryPath} (${regions.length} regions)`);
    return regions;
  }
}
