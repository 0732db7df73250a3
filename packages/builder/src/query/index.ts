/**
 * Query module: configuration -> Overpass QL text.
 */

export {
  buildPlayQuery,
  validatePlayQueryConfig,
  uniqueRegions,
  SEARCH_AREA,
} from "./builder.js";
export {
  renderTagFilter,
  rulePattern,
  validateTagFilterRule,
  quoteLiteral,
  escapeRegex,
  MATCH_KINDS,
} from "./rules.js";
export {
  DEFAULT_PLAY_QUERY,
  DEFAULT_REGIONS,
  DEFAULT_RULES,
  DEFAULT_TIMEOUT,
  LEISURE_VALUES,
  ATTRACTION_VALUES,
  TOURISM_VALUE,
  SPORT_VALUE_PREFIXES,
} from "./defaults.js";
export {
  readQueryFile,
  writeQueryFile,
  hasCenterOutput,
  DEFAULT_QUERY_FILE,
} from "./query-file.js";
