/**
 * @funmap/builder
 *
 * Builds the venue query and turns its Overpass answer into a map layer.
 *
 * Pipeline:
 * 1. Build Overpass QL from regions + tag filter rules
 * 2. Dispatch to Overpass (single endpoint, or mirror fallback)
 * 3. Reduce every element to a center point + tags
 * 4. Write point-only GeoJSON
 */

// Query building
export {
  buildPlayQuery,
  validatePlayQueryConfig,
  uniqueRegions,
  SEARCH_AREA,
  renderTagFilter,
  rulePattern,
  validateTagFilterRule,
  quoteLiteral,
  escapeRegex,
  MATCH_KINDS,
  DEFAULT_PLAY_QUERY,
  DEFAULT_REGIONS,
  DEFAULT_RULES,
  DEFAULT_TIMEOUT,
  LEISURE_VALUES,
  ATTRACTION_VALUES,
  TOURISM_VALUE,
  SPORT_VALUE_PREFIXES,
  readQueryFile,
  writeQueryFile,
  hasCenterOutput,
  DEFAULT_QUERY_FILE,
} from "./query/index.js";

// Overpass API
export {
  runOverpassQuery,
  fetchWithFallback,
  checkDataFreshness,
  dataLagHours,
  DEFAULT_ENDPOINT,
  OVERPASS_ENDPOINTS,
  DEFAULT_MAX_DATA_LAG_HOURS,
  DEFAULT_RETRY_ROUNDS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  formatDelay,
  type OverpassOptions,
  type FallbackOptions,
  type FetchResult,
} from "./overpass/index.js";

// GeoJSON export
export {
  elementPoint,
  elementToPointFeature,
  elementsToFeatures,
  tagsOf,
  toFeatureCollection,
  writeGeoJson,
  checkFeatureDrop,
  readFeatureCount,
  dropPercent,
  DEFAULT_DROP_THRESHOLD,
  type ConversionResult,
} from "./export/index.js";

// Pipeline + config
export {
  runFetchPipeline,
  DEFAULT_OUTPUT_FILE,
  type PipelineOptions,
  type PipelineResult,
} from "./pipeline.js";
export {
  loadFetchConfig,
  ENV_DROP_THRESHOLD,
  ENV_MAX_DATA_LAG_HOURS,
  ENV_USER_AGENT,
  DEFAULT_USER_AGENT,
  type FetchConfig,
} from "./config.js";

export {
  InvalidConfigurationError,
  QueryFileError,
  OverpassRemarkError,
  OverpassTimeoutError,
  OverpassFetchError,
  EmptyResultError,
  FeatureDropError,
} from "./errors.js";
