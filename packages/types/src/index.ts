/**
 * @funmap/types
 *
 * Shared domain types for the venue map.
 *
 * - Query: regions + tag filter rules handed to the builder
 * - Feature: point-only GeoJSON written for the map layer
 */

export * from "./query.js";
export * from "./feature.js";
