import type { OverpassJson } from "overpass-ts";

const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * How far behind live OSM the server's data is, in hours.
 *
 * @returns Lag in hours, or null when the payload has no usable timestamp
 */
export function dataLagHours(data: OverpassJson, now: Date = new Date()): number | null {
  const timestamp = data.osm3s?.timestamp_osm_base;
  if (!timestamp) return null;

  const parsed = Date.parse(timestamp);
  if (Number.isNaN(parsed)) return null;

  return (now.getTime() - parsed) / MS_PER_HOUR;
}

/**
 * Whether a payload is recent enough to use.
 *
 * A payload without a parseable timestamp counts as fresh.
 */
export function checkDataFreshness(
  data: OverpassJson,
  maxLagHours: number,
  now: Date = new Date()
): boolean {
  const lag = dataLagHours(data, now);
  return lag === null || lag <= maxLagHours;
}
