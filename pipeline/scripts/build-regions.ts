/**
 * Pipeline Stage 1: Build the region registry.
 *
 * Geocodes the 63 provinces through Nominatim and writes
 * data/location/regions.csv. Skips when the registry already exists unless
 * run with --force.
 */
import { existsSync } from "node:fs";
import { NominatimGeocoder } from "../services/nominatim-geocoder.js";
import { RegionRegistry } from "../services/region-registry.js";
import { EXIT_CODE_FAILURE, NOMINATIM_BASE_URL, REGIONS_PATH } from "./pipeline-config.js";

const main = async () => {
  const startTime = Date.now();
  const force = process.argv.includes("--force");
  console.log("=== Pipeline: Build Region Registry ===\n");

  if (existsSync(REGIONS_PATH) && !force) {
    console.log(`[build-regions] ${REGIONS_PATH} already exists; pass --force to rebuild.`);
    return;
  }

  const registry = new RegionRegistry({
    registryPath: REGIONS_PATH,
    geocoder: new NominatimGeocoder({ baseUrl: NOMINATIM_BASE_URL })
  });
  const regions = await registry.build();

  const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\n✓ Build-regions complete: ${regions.length} regions (${elapsedSeconds}s)`);
};

main().catch((error: unknown) => {
  console.error("Fatal error in build-regions:");
  console.error(error);
  process.exit(EXIT_CODE_FAILURE);
});
