/**
 * Single-endpoint Overpass API dispatch.
 *
 * Sends a query through the overpass-ts client and hands back the JSON
 * payload. Failures are surfaced as-is: no retry, no interpretation.
 */

import { overpassJson, OverpassRuntimeError } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { OverpassRemarkError, OverpassTimeoutError } from "../errors.js";

/** Options for a single Overpass request */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** User-agent string */
  userAgent?: string;
  /** Give up on the request after this many ms (default: no limit) */
  timeoutMs?: number;
}

export const DEFAULT_ENDPOINT = "https://overpass-api.de/api/interpreter";

/**
 * Reject with OverpassTimeoutError if `request` has not settled in time.
 *
 * overpass-ts takes no abort signal, so the underlying request is left to
 * finish on its own.
 */
function withTimeout<T>(
  request: Promise<T>,
  endpoint: string,
  timeoutMs: number | undefined
): Promise<T> {
  if (timeoutMs === undefined) return request;

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OverpassTimeoutError(endpoint, timeoutMs)), timeoutMs);
  });
  return Promise.race([request, expiry]).finally(() => clearTimeout(timer));
}

/**
 * Run a query against one Overpass endpoint.
 *
 * @param query - Overpass QL query text
 * @param options - Endpoint, user agent and timeout
 * @returns The Overpass JSON payload
 * @throws OverpassRemarkError if the payload reports a runtime error or timeout
 * @throws OverpassTimeoutError if `timeoutMs` passes with no answer
 */
export async function runOverpassQuery(
  query: string,
  options?: OverpassOptions
): Promise<OverpassJson> {
  const endpoint = options?.endpoint ?? DEFAULT_ENDPOINT;

  const overpassOpts: Partial<OverpassTsOptions> = { endpoint };
  if (options?.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  try {
    return await withTimeout(overpassJson(query, overpassOpts), endpoint, options?.timeoutMs);
  } catch (err) {
    // overpass-ts raises in-band remarks itself, prefixed with "Overpass Error: "
    if (err instanceof OverpassRuntimeError) {
      throw new OverpassRemarkError(endpoint, err.errors.join("\n"), { cause: err });
    }
    throw err;
  }
}
