export {
  elementPoint,
  elementToPointFeature,
  elementsToFeatures,
  tagsOf,
  toFeatureCollection,
  writeGeoJson,
  type ConversionResult,
} from "./geojson.js";
export {
  checkFeatureDrop,
  readFeatureCount,
  dropPercent,
  DEFAULT_DROP_THRESHOLD,
} from "./safety.js";
