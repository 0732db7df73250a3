/**
 * Tag filter rendering.
 *
 * Each TagFilterRule becomes one Overpass QL bracket clause:
 *
 *   exact        ["tourism"="zoo"]
 *   alternation  ["attraction"~"^(train|carousel)$"]
 *   prefix       ["sport"~"^(karting|climbing)"]
 *
 * Alternation is anchored at both ends so "trains" never matches "train".
 * Prefix is anchored only at the start, so sub-variants such as
 * "climbing_adventure" still match "climbing".
 */

import type { MatchKind, TagFilterRule } from "@funmap/types";
import { InvalidConfigurationError } from "../errors.js";

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

export const MATCH_KINDS: readonly MatchKind[] = ["exact", "alternation", "prefix"];

/**
 * Escape a string for use inside an Overpass QL double-quoted literal.
 */
export function quoteLiteral(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Escape regex metacharacters so a candidate value matches literally.
 */
export function escapeRegex(value: string): string {
  return value.replace(REGEX_SPECIALS, "\\$&");
}

/**
 * Build the (unquoted) regex a pattern rule compares against.
 */
export function rulePattern(rule: TagFilterRule): string {
  const group = `^(${rule.values.map(escapeRegex).join("|")})`;
  return rule.match === "alternation" ? `${group}$` : group;
}

/**
 * Render one rule as an Overpass QL tag filter clause.
 */
export function renderTagFilter(rule: TagFilterRule): string {
  const key = quoteLiteral(rule.key);
  if (rule.match === "exact") {
    const [value] = rule.values;
    return `[${key}=${quoteLiteral(value ?? "")}]`;
  }
  return `[${key}~${quoteLiteral(rulePattern(rule))}]`;
}

/**
 * Validate a single rule's shape.
 *
 * @param rule - Rule to check
 * @param field - Path used in error messages, e.g. "rules[0]"
 * @throws InvalidConfigurationError
 */
export function validateTagFilterRule(rule: TagFilterRule, field: string): void {
  if (!MATCH_KINDS.includes(rule.match)) {
    throw new InvalidConfigurationError(
      `${field}.match`,
      `unknown match kind "${String(rule.match)}" (expected ${MATCH_KINDS.join(", ")})`,
    );
  }

  if (rule.key.trim().length === 0) {
    throw new InvalidConfigurationError(`${field}.key`, "tag key must not be empty");
  }
  if (CONTROL_CHARS.test(rule.key)) {
    throw new InvalidConfigurationError(`${field}.key`, "tag key contains a control character");
  }

  if (rule.values.length === 0) {
    throw new InvalidConfigurationError(`${field}.values`, "at least one candidate value is required");
  }
  if (rule.match === "exact" && rule.values.length !== 1) {
    throw new InvalidConfigurationError(
      `${field}.values`,
      `exact rules take exactly one value, got ${rule.values.length}`,
    );
  }

  rule.values.forEach((value, i) => {
    if (value.length === 0) {
      throw new InvalidConfigurationError(`${field}.values[${i}]`, "value must not be empty");
    }
    if (CONTROL_CHARS.test(value)) {
      throw new InvalidConfigurationError(`${field}.values[${i}]`, "value contains a control character");
    }
  });
}
