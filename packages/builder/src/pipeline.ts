/**
 * Fetch pipeline: query file -> Overpass -> point GeoJSON on disk.
 *
 * Pipeline:
 * 1. Read the .ql query
 * 2. Fetch with endpoint fallback
 * 3. Convert every element to a Point feature
 * 4. Refuse an empty result or a large drop against the previous output
 * 5. Write the FeatureCollection
 */

import { EmptyResultError } from "./errors.js";
import { DEFAULT_QUERY_FILE, readQueryFile } from "./query/query-file.js";
import { fetchWithFallback, type FallbackOptions } from "./overpass/fallback.js";
import {
  elementsToFeatures,
  toFeatureCollection,
  writeGeoJson,
} from "./export/geojson.js";
import { checkFeatureDrop, DEFAULT_DROP_THRESHOLD } from "./export/safety.js";

export const DEFAULT_OUTPUT_FILE = "data/funmap.geojson";

/** Options for runFetchPipeline */
export interface PipelineOptions {
  /** Query file to read (default: query/playquery.ql) */
  queryPath?: string;
  /** GeoJSON file to write (default: data/funmap.geojson) */
  outputPath?: string;
  /** Maximum allowed percent drop against the previous output (default: 50) */
  dropThreshold?: number;
  /** Endpoint fallback and freshness settings */
  overpass?: FallbackOptions;
}

export interface PipelineResult {
  outputPath: string;
  endpoint: string;
  elementsCount: number;
  featuresCount: number;
  skippedCount: number;
  durationMs: number;
}

/**
 * Run the full fetch pipeline.
 *
 * Nothing is written unless every check passes, so a failed run leaves
 * the previous output in place.
 *
 * @throws QueryFileError, OverpassFetchError, EmptyResultError, FeatureDropError
 */
export async function runFetchPipeline(
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const startTime = Date.now();
  const queryPath = options.queryPath ?? DEFAULT_QUERY_FILE;
  const outputPath = options.outputPath ?? DEFAULT_OUTPUT_FILE;

  const query = readQueryFile(queryPath);
  const { data, endpoint } = await fetchWithFallback(query, options.overpass);

  const { features, skipped } = elementsToFeatures(data.elements);
  if (features.length === 0) {
    throw new EmptyResultError();
  }
  console.log(`[pipeline] Converted ${features.length} features.`);

  checkFeatureDrop(
    features.length,
    outputPath,
    options.dropThreshold ?? DEFAULT_DROP_THRESHOLD
  );

  writeGeoJson(outputPath, toFeatureCollection(features));
  console.log(`[pipeline] Wrote ${outputPath}`);

  return {
    outputPath,
    endpoint,
    elementsCount: data.elements.length,
    featuresCount: features.length,
    skippedCount: skipped,
    durationMs: Date.now() - startTime,
  };
}
