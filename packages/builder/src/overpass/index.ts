/**
 * Overpass API dispatch.
 *
 * runOverpassQuery talks to one endpoint and reports failures verbatim;
 * fetchWithFallback layers mirror fallback and staleness checks on top.
 */

export {
  runOverpassQuery,
  DEFAULT_ENDPOINT,
  type OverpassOptions,
} from "./client.js";
export {
  fetchWithFallback,
  OVERPASS_ENDPOINTS,
  DEFAULT_MAX_DATA_LAG_HOURS,
  DEFAULT_RETRY_ROUNDS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  formatDelay,
  type FallbackOptions,
  type FetchResult,
} from "./fallback.js";
export { checkDataFreshness, dataLagHours } from "./freshness.js";
