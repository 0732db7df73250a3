/**
 * GeoJSON export for Overpass results.
 *
 * Every element becomes a Point feature so the map layer can treat
 * nodes, ways and relations the same way:
 * - nodes use their own lat/lon
 * - ways and relations use the `center` from `out center;`, falling
 *   back to the middle of `bounds`
 *
 * Feature properties are the element's tags plus `@id` ("way/123") and
 * `@type` ("way").
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { OverpassJson } from "overpass-ts";
import type {
  OsmElementType,
  OsmTags,
  PointFeature,
  PointFeatureCollection,
} from "@funmap/types";

type OverpassElement = OverpassJson["elements"][number];

/** Result of converting a batch of elements */
export interface ConversionResult {
  features: PointFeature[];
  /** Elements with no usable point geometry */
  skipped: number;
}

function readPoint(value: unknown): [number, number] | null {
  if (typeof value !== "object" || value === null) return null;
  if (!("lat" in value) || !("lon" in value)) return null;
  const { lat, lon } = value;
  return typeof lat === "number" && typeof lon === "number" ? [lon, lat] : null;
}

function boundsMidpoint(value: unknown): [number, number] | null {
  if (typeof value !== "object" || value === null) return null;
  if (!("minlat" in value && "maxlat" in value && "minlon" in value && "maxlon" in value)) {
    return null;
  }
  const { minlat, maxlat, minlon, maxlon } = value;
  if (
    typeof minlat !== "number" ||
    typeof maxlat !== "number" ||
    typeof minlon !== "number" ||
    typeof maxlon !== "number"
  ) {
    return null;
  }
  return [(minlon + maxlon) / 2, (minlat + maxlat) / 2];
}

/**
 * Representative [lon, lat] for an element, or null if it has none.
 */
export function elementPoint(element: OverpassElement): [number, number] | null {
  switch (element.type) {
    case "node":
      return readPoint(element);
    case "way":
    case "relation":
      return (
        readPoint("center" in element ? element.center : undefined) ??
        boundsMidpoint("bounds" in element ? element.bounds : undefined)
      );
    default:
      return null;
  }
}

const OSM_ELEMENT_TYPES: readonly OsmElementType[] = ["node", "way", "relation"];

function osmTypeOf(element: OverpassElement): OsmElementType | undefined {
  return OSM_ELEMENT_TYPES.find((t) => t === element.type);
}

/**
 * String-valued tags of an element.
 */
export function tagsOf(element: object): OsmTags {
  const tags: OsmTags = {};
  if (!("tags" in element) || typeof element.tags !== "object" || element.tags === null) {
    return tags;
  }
  for (const [key, value] of Object.entries(element.tags)) {
    if (typeof value === "string") tags[key] = value;
  }
  return tags;
}

/**
 * Convert one Overpass element to a Point feature.
 *
 * @returns The feature, or null for elements without a point
 *   (non-OSM element types, ways/relations without center or bounds)
 */
export function elementToPointFeature(element: OverpassElement): PointFeature | null {
  const type = osmTypeOf(element);
  if (!type) return null;

  const coordinates = elementPoint(element);
  if (!coordinates) return null;

  return {
    type: "Feature",
    geometry: { type: "Point", coordinates },
    properties: {
      ...tagsOf(element),
      "@id": `${type}/${element.id}`,
      "@type": type,
    },
  };
}

/**
 * Convert a batch of elements, dropping those without a point.
 */
export function elementsToFeatures(
  elements: readonly OverpassElement[]
): ConversionResult {
  const features: PointFeature[] = [];
  let skipped = 0;

  for (const element of elements) {
    const feature = elementToPointFeature(element);
    if (feature) {
      features.push(feature);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    console.warn(`[geojson] Skipped ${skipped} elements without point geometry.`);
  }

  return { features, skipped };
}

export function toFeatureCollection(features: PointFeature[]): PointFeatureCollection {
  return { type: "FeatureCollection", features };
}

/**
 * Write a FeatureCollection as pretty-printed JSON, creating parent
 * directories as needed.
 */
export function writeGeoJson(path: string, collection: PointFeatureCollection): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(collection, null, 2)}\n`, "utf-8");
}
