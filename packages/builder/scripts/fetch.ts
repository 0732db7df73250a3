/**
 * Fetch venues from Overpass and write point-only GeoJSON.
 *
 * Usage: npx tsx packages/builder/scripts/fetch.ts
 *
 * Reads query/playquery.ql and writes data/funmap.geojson, both relative
 * to the repository root. See src/config.ts for the environment variables.
 */

import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import {
  runFetchPipeline,
  loadFetchConfig,
  OverpassFetchError,
  DEFAULT_QUERY_FILE,
  DEFAULT_OUTPUT_FILE,
} from "../src/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = resolve(__dirname, "../../..");

async function main() {
  const config = loadFetchConfig();

  const result = await runFetchPipeline({
    queryPath: resolve(REPO_ROOT, DEFAULT_QUERY_FILE),
    outputPath: resolve(REPO_ROOT, DEFAULT_OUTPUT_FILE),
    dropThreshold: config.dropThreshold,
    overpass: {
      userAgent: config.userAgent,
      maxDataLagHours: config.maxDataLagHours,
    },
  });

  console.log("");
  console.log("=== Fetch Complete ===");
  console.log(`Endpoint: ${result.endpoint}`);
  console.log(`Elements: ${result.elementsCount.toLocaleString()}`);
  console.log(`Features: ${result.featuresCount.toLocaleString()}`);
  console.log(`Skipped: ${result.skippedCount.toLocaleString()}`);
  console.log(`Time: ${(result.durationMs / 1000).toFixed(1)}s`);
}

// A timed-out request may still hold its socket open, so exit explicitly.
main().then(() => process.exit(0), (err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  if (err instanceof OverpassFetchError && err.cause) {
    console.error(`Last error: ${err.cause instanceof Error ? err.cause.message : String(err.cause)}`);
  }
  process.exit(1);
});
