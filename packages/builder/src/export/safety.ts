/**
 * Guard against overwriting a good output with a truncated one.
 *
 * A partial Overpass answer (an overloaded mirror, a boundary relation that
 * failed to resolve) still parses fine, so compare against the feature
 * count of the file we are about to replace.
 */

import { existsSync, readFileSync } from "node:fs";
import { FeatureDropError } from "../errors.js";

export const DEFAULT_DROP_THRESHOLD = 50;

/**
 * Feature count of an existing GeoJSON file.
 *
 * @returns The count, or null if the file is missing or unreadable
 */
export function readFeatureCount(path: string): number | null {
  if (!existsSync(path)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    console.warn(`[geojson] Could not read previous output ${path}: ${String(err)}`);
    return null;
  }

  if (typeof parsed !== "object" || parsed === null || !("features" in parsed)) {
    return 0;
  }
  return Array.isArray(parsed.features) ? parsed.features.length : 0;
}

/**
 * Percentage drop from oldCount to newCount (negative for growth).
 */
export function dropPercent(oldCount: number, newCount: number): number {
  return ((oldCount - newCount) / oldCount) * 100;
}

/**
 * Abort if the new feature count dropped more than `thresholdPct` percent
 * below the count already at `outputPath`.
 *
 * Passes when there is no previous output or it held no features.
 *
 * @throws FeatureDropError
 */
export function checkFeatureDrop(
  newCount: number,
  outputPath: string,
  thresholdPct: number = DEFAULT_DROP_THRESHOLD
): void {
  const oldCount = readFeatureCount(outputPath);
  if (oldCount === null || oldCount === 0) return;

  const drop = dropPercent(oldCount, newCount);
  if (drop > thresholdPct) {
    throw new FeatureDropError(oldCount, newCount, drop);
  }
}
