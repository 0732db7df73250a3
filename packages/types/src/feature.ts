/**
 * GeoJSON output types (the subset we write).
 *
 * Every feature is a Point, regardless of whether the source element was
 * a node, way or relation.
 */

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

/** Element types that can carry a point */
export type OsmElementType = "node" | "way" | "relation";

/** Feature properties: the element's tags plus its identity */
export type PointFeatureProperties = OsmTags & {
  /** "<type>/<id>", e.g. "way/123" */
  "@id": string;
  "@type": OsmElementType;
};

export interface GeoJsonPoint {
  type: "Point";
  /** [lon, lat] */
  coordinates: [number, number];
}

export interface PointFeature {
  type: "Feature";
  geometry: GeoJsonPoint;
  properties: PointFeatureProperties;
}

export interface PointFeatureCollection {
  type: "FeatureCollection";
  features: PointFeature[];
}
