/**
 * Query configuration - what the builder turns into Overpass QL.
 *
 * A query selects administrative boundaries by relation id, merges them
 * into one search area, and matches any element that satisfies at least
 * one tag filter rule inside that area.
 */

/** OSM relation id of an administrative boundary */
export type RegionId = number;

/**
 * How a rule compares a tag value against its candidates.
 *
 * - exact: the value equals the single candidate
 * - alternation: the value equals one of the candidates
 * - prefix: the value starts with one of the candidates
 */
export type MatchKind = "exact" | "alternation" | "prefix";

/** A predicate over one tag's value */
export interface TagFilterRule {
  /** Tag key, e.g. "leisure" */
  key: string;
  match: MatchKind;
  /** Candidate values (exactly one for "exact") */
  values: readonly string[];
}

/**
 * Output shape requested from Overpass.
 *
 * Only "center" exists: every element, whatever its geometry, comes back
 * as one representative point plus its full tag set.
 */
export type OutputMode = "center";

/** Everything needed to build a query */
export interface PlayQueryConfig {
  /** Boundary relations merged into the search area */
  regions: readonly RegionId[];
  /** Rules combined with OR */
  rules: readonly TagFilterRule[];
  /** Server-side evaluation bound in seconds */
  timeout: number;
  outputMode: OutputMode;
}
