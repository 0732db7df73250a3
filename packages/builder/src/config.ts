/**
 * Fetch pipeline configuration from the environment.
 *
 *   FUNMAP_DROP_THRESHOLD      percent drop that aborts a run (default: 50)
 *   FUNMAP_MAX_DATA_LAG_HOURS  reject mirrors further behind than this (default: 48)
 *   FUNMAP_USER_AGENT          HTTP user agent (default: funmap-fetch/1.0)
 */

import { InvalidConfigurationError } from "./errors.js";
import { DEFAULT_DROP_THRESHOLD } from "./export/safety.js";
import { DEFAULT_MAX_DATA_LAG_HOURS } from "./overpass/fallback.js";

export const ENV_DROP_THRESHOLD = "FUNMAP_DROP_THRESHOLD";
export const ENV_MAX_DATA_LAG_HOURS = "FUNMAP_MAX_DATA_LAG_HOURS";
export const ENV_USER_AGENT = "FUNMAP_USER_AGENT";

export const DEFAULT_USER_AGENT = "funmap-fetch/1.0";

/** Settings the fetch pipeline takes from the environment */
export interface FetchConfig {
  dropThreshold: number;
  maxDataLagHours: number;
  userAgent: string;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  parse: (raw: string) => number
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = parse(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidConfigurationError(name, `expected a non-negative number, got "${raw}"`);
  }
  return value;
}

/**
 * Read fetch settings from an environment (default: process.env).
 *
 * @throws InvalidConfigurationError on an unparseable number
 */
export function loadFetchConfig(env: NodeJS.ProcessEnv = process.env): FetchConfig {
  return {
    dropThreshold: readNumber(env, ENV_DROP_THRESHOLD, DEFAULT_DROP_THRESHOLD, (raw) =>
      /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN
    ),
    maxDataLagHours: readNumber(env, ENV_MAX_DATA_LAG_HOURS, DEFAULT_MAX_DATA_LAG_HOURS, Number),
    userAgent: env[ENV_USER_AGENT]?.trim() || DEFAULT_USER_AGENT,
  };
}
