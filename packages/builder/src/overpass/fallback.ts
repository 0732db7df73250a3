/**
 * Multi-endpoint Overpass fetching.
 *
 * Public Overpass instances are frequently overloaded or lag behind live
 * OSM. This walks a list of mirrors in order, skips any whose data is
 * stale, and after a full round of failures waits and tries once more.
 * Each request is bounded, so a mirror that never answers counts as failed.
 */

import type { OverpassJson } from "overpass-ts";
import { InvalidConfigurationError, OverpassFetchError } from "../errors.js";
import { runOverpassQuery } from "./client.js";
import { checkDataFreshness } from "./freshness.js";

export const OVERPASS_ENDPOINTS: readonly string[] = [
  "https://overpass-api.de/api/interpreter",
  "https://overpass.kumi.systems/api/interpreter",
  "https://maps.mail.ru/osm/tools/overpass/api/interpreter",
  "https://overpass.private.coffee/api/interpreter",
];

export const DEFAULT_MAX_DATA_LAG_HOURS = 48;
/** Initial round plus one retry */
export const DEFAULT_RETRY_ROUNDS = 2;
export const DEFAULT_RETRY_DELAY_MS = 60 * 60 * 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 180 * 1000;

/** Options for fetchWithFallback */
export interface FallbackOptions {
  /** Endpoints tried in order (default: OVERPASS_ENDPOINTS) */
  endpoints?: readonly string[];
  /** User-agent string */
  userAgent?: string;
  /** Reject payloads older than this (default: 48) */
  maxDataLagHours?: number;
  /** Total rounds over the endpoint list (default: 2) */
  rounds?: number;
  /** Wait between rounds in ms (default: 60 minutes) */
  retryDelayMs?: number;
  /** Per-request timeout in ms (default: 180 seconds) */
  requestTimeoutMs?: number;
  /** Clock used for the freshness check */
  now?: () => Date;
}

/** A successful fetch */
export interface FetchResult {
  data: OverpassJson;
  /** Endpoint that answered */
  endpoint: string;
  /** Requests made, including the successful one */
  attempts: number;
}

/** "45 seconds" under a minute, whole minutes above */
export function formatDelay(ms: number): string {
  const underMinute = ms < 60 * 1000;
  const value = Math.round(underMinute ? ms / 1000 : ms / 60000);
  const unit = underMinute ? "second" : "minute";
  return `${value} ${unit}${value === 1 ? "" : "s"}`;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fetch a query, falling back across endpoints.
 *
 * @param query - Overpass QL query text
 * @param options - Endpoint list, retry and freshness settings
 * @returns The first fresh payload and where it came from
 * @throws OverpassFetchError when every endpoint fails in every round
 */
export async function fetchWithFallback(
  query: string,
  options: FallbackOptions = {}
): Promise<FetchResult> {
  const endpoints = options.endpoints ?? OVERPASS_ENDPOINTS;
  const rounds = options.rounds ?? DEFAULT_RETRY_ROUNDS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const maxLagHours = options.maxDataLagHours ?? DEFAULT_MAX_DATA_LAG_HOURS;
  const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const now = options.now ?? (() => new Date());

  if (endpoints.length === 0) {
    throw new InvalidConfigurationError("endpoints", "at least one endpoint is required");
  }
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw new InvalidConfigurationError("rounds", `must be a positive integer, got ${rounds}`);
  }
  if (!Number.isFinite(requestTimeoutMs) || requestTimeoutMs <= 0) {
    throw new InvalidConfigurationError(
      "requestTimeoutMs",
      `must be a positive number, got ${requestTimeoutMs}`
    );
  }

  let attempts = 0;
  let lastError: unknown;
  let lastEndpoint: string | undefined;

  for (let round = 0; round < rounds; round++) {
    if (round > 0) {
      console.warn(
        `[overpass] All endpoints failed. Waiting ${formatDelay(retryDelayMs)} ` +
          `then retrying (${round + 1}/${rounds})...`
      );
      await new Promise((r) => setTimeout(r, retryDelayMs));
    }

    for (const endpoint of endpoints) {
      attempts++;
      console.log(`[overpass] Trying ${endpoint} ...`);

      try {
        const data = await runOverpassQuery(query, {
          endpoint,
          userAgent: options.userAgent,
          timeoutMs: requestTimeoutMs,
        });

        if (!checkDataFreshness(data, maxLagHours, now())) {
          console.warn(`[overpass] Data from ${endpoint} too stale, trying next server...`);
          continue;
        }

        console.log(`[overpass] Success: ${data.elements.length} elements`);
        return { data, endpoint, attempts };
      } catch (err) {
        console.error(`[overpass] Failed: ${describeError(err)}`);
        lastError = err;
        lastEndpoint = endpoint;
      }
    }
  }

  throw new OverpassFetchError(lastEndpoint, attempts, { cause: lastError });
}
