/**
 * The family-entertainment query the map is built from.
 */

import type { PlayQueryConfig, RegionId, TagFilterRule } from "@funmap/types";

/** Boundary relations merged into the search area */
export const DEFAULT_REGIONS: readonly RegionId[] = [1633325, 2534201];

/** Server-side evaluation bound, seconds */
export const DEFAULT_TIMEOUT = 180;

/** leisure=* values for play venues */
export const LEISURE_VALUES = [
  "playground",
  "water_park",
  "amusement_arcade",
  "trampoline_park",
  "miniature_golf",
  "indoor_play",
  "adventure_park",
  "escape_game",
] as const;

/** attraction=* values for rides */
export const ATTRACTION_VALUES = [
  "train",
  "carousel",
  "roller_coaster",
  "amusement_ride",
  "animal",
  "maze",
  "summer_toboggan",
  "big_wheel",
] as const;

export const TOURISM_VALUE = "zoo";

/**
 * sport=* prefixes. Matched by leading prefix, not whole value, so tagged
 * variants (e.g. "karting;bowling") are picked up too.
 */
export const SPORT_VALUE_PREFIXES = [
  "karting",
  "bowling",
  "climbing",
  "ice_skating",
  "laser_tag",
] as const;

export const DEFAULT_RULES: readonly TagFilterRule[] = [
  { key: "leisure", match: "alternation", values: LEISURE_VALUES },
  { key: "attraction", match: "alternation", values: ATTRACTION_VALUES },
  { key: "tourism", match: "exact", values: [TOURISM_VALUE] },
  { key: "sport", match: "prefix", values: SPORT_VALUE_PREFIXES },
];

export const DEFAULT_PLAY_QUERY: PlayQueryConfig = {
  regions: DEFAULT_REGIONS,
  rules: DEFAULT_RULES,
  timeout: DEFAULT_TIMEOUT,
  outputMode: "center",
};
