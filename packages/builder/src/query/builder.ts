/**
 * Overpass QL query construction.
 *
 * The query merges every selected boundary relation into a single area
 * first, then matches rules against that merged area. Filtering the union
 * rather than each region means an element inside two regions is still
 * returned once.
 */

import type { OutputMode, PlayQueryConfig, RegionId } from "@funmap/types";
import { InvalidConfigurationError } from "../errors.js";
import { renderTagFilter, validateTagFilterRule } from "./rules.js";

/** Name of the derived area set inside the query */
export const SEARCH_AREA = "searchArea";

const OUTPUT_STATEMENTS: Record<OutputMode, string> = {
  center: "out center;",
};

/**
 * Check a configuration before anything is built or sent.
 *
 * @throws InvalidConfigurationError
 */
export function validatePlayQueryConfig(config: PlayQueryConfig): void {
  if (config.regions.length === 0) {
    throw new InvalidConfigurationError("regions", "at least one region id is required");
  }
  config.regions.forEach((id, i) => {
    if (!Number.isSafeInteger(id) || id <= 0) {
      throw new InvalidConfigurationError(
        `regions[${i}]`,
        `region id must be a positive integer, got ${String(id)}`,
      );
    }
  });

  if (config.rules.length === 0) {
    throw new InvalidConfigurationError("rules", "at least one filter rule is required");
  }
  config.rules.forEach((rule, i) => validateTagFilterRule(rule, `rules[${i}]`));

  if (!Number.isSafeInteger(config.timeout) || config.timeout <= 0) {
    throw new InvalidConfigurationError(
      "timeout",
      `timeout must be a positive whole number of seconds, got ${String(config.timeout)}`,
    );
  }

  if (!Object.hasOwn(OUTPUT_STATEMENTS, config.outputMode)) {
    throw new InvalidConfigurationError(
      "outputMode",
      `unsupported output mode "${String(config.outputMode)}"`,
    );
  }
}

/**
 * Drop repeated ids, keeping the first occurrence of each.
 */
export function uniqueRegions(regions: readonly RegionId[]): RegionId[] {
  return [...new Set(regions)];
}

/**
 * Build the Overpass QL query for a configuration.
 *
 * Produces:
 *
 *   [out:json][timeout:180];
 *   rel(id:1633325,2534201);
 *   map_to_area->.searchArea;
 *   (
 *     nwr["tourism"="zoo"](area.searchArea);
 *   );
 *   out center;
 *
 * The output is deterministic: the same configuration always yields the
 * same text.
 *
 * @param config - Regions, rules, timeout and output mode
 * @returns Overpass QL query string
 * @throws InvalidConfigurationError if the configuration is unusable
 */
export function buildPlayQuery(config: PlayQueryConfig): string {
  validatePlayQueryConfig(config);

  const regionList = uniqueRegions(config.regions).join(",");
  const filters = config.rules
    .map((rule) => `  nwr${renderTagFilter(rule)}(area.${SEARCH_AREA});`)
    .join("\n");

  return `[out:json][timeout:${config.timeout}];
rel(id:${regionList});
map_to_area->.${SEARCH_AREA};
(
${filters}
);
${OUTPUT_STATEMENTS[config.outputMode]}`;
}
