import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { node, way, relation } from "../testing/overpass-fixtures.js";
import {
  elementPoint,
  elementToPointFeature,
  elementsToFeatures,
  tagsOf,
  toFeatureCollection,
  writeGeoJson,
} from "./geojson.js";

describe("elementPoint", () => {
  it("uses lat/lon for nodes, as [lon, lat]", () => {
    expect(elementPoint(node(1, 52.5, 13.4))).toEqual([13.4, 52.5]);
  });

  it("uses center for ways", () => {
    expect(elementPoint(way(2, { center: { lat: 48.1, lon: 11.6 } }))).toEqual([11.6, 48.1]);
  });

  it("prefers center over bounds", () => {
    const element = relation(3, {
      center: { lat: 1, lon: 2 },
      bounds: { minlat: 10, minlon: 20, maxlat: 30, maxlon: 40 },
    });
    expect(elementPoint(element)).toEqual([2, 1]);
  });

  it("falls back to the middle of bounds", () => {
    const element = relation(3, {
      bounds: { minlat: 10, minlon: 20, maxlat: 30, maxlon: 40 },
    });
    expect(elementPoint(element)).toEqual([30, 20]);
  });

  it("is null for a way with neither center nor bounds", () => {
    expect(elementPoint(way(4))).toBeNull();
  });
});

describe("elementToPointFeature", () => {
  it("builds a Point feature with tags and identity", () => {
    const feature = elementToPointFeature(
      way(42, { center: { lat: 48.1, lon: 11.6 }, tags: { leisure: "playground", name: "Spielplatz" } })
    );
    expect(feature).toEqual({
      type: "Feature",
      geometry: { type: "Point", coordinates: [11.6, 48.1] },
      properties: {
        leisure: "playground",
        name: "Spielplatz",
        "@id": "way/42",
        "@type": "way",
      },
    });
  });

  it("gives untagged nodes identity-only properties", () => {
    expect(elementToPointFeature(node(7, 1, 2))?.properties).toEqual({
      "@id": "node/7",
      "@type": "node",
    });
  });

  it("returns null when there is no point", () => {
    expect(elementToPointFeature(relation(9, { tags: { tourism: "zoo" } }))).toBeNull();
  });
});

describe("tagsOf", () => {
  it("keeps only string values", () => {
    expect(tagsOf({ tags: { name: "Zoo", capacity: 5 } })).toEqual({ name: "Zoo" });
  });

  it("is empty without tags", () => {
    expect(tagsOf({})).toEqual({});
  });
});

describe("elementsToFeatures", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("converts mixed geometry types and counts skipped elements", () => {
    const { features, skipped } = elementsToFeatures([
      node(1, 52.5, 13.4, { tourism: "zoo" }),
      way(2, { center: { lat: 48.1, lon: 11.6 }, tags: { leisure: "water_park" } }),
      way(3, { tags: { leisure: "playground" } }),
      relation(4, { center: { lat: 50, lon: 8 }, tags: { leisure: "playground" } }),
    ]);

    expect(features.map((f) => f.properties["@id"])).toEqual(["node/1", "way/2", "relation/4"]);
    expect(skipped).toBe(1);
    expect(console.warn).toHaveBeenCalledWith(
      "[geojson] Skipped 1 elements without point geometry."
    );
  });

  it("does not warn when nothing is skipped", () => {
    elementsToFeatures([node(1, 0, 0)]);
    expect(console.warn).not.toHaveBeenCalled();
  });
});

describe("writeGeoJson", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "geojson-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes pretty-printed JSON with a trailing newline", () => {
    const path = join(dir, "out", "map.geojson");
    const feature = elementToPointFeature(node(1, 52.5, 13.4, { tourism: "zoo" }));
    const collection = toFeatureCollection(feature ? [feature] : []);

    writeGeoJson(path, collection);

    const raw = readFileSync(path, "utf-8");
    expect(raw).toBe(`${JSON.stringify(collection, null, 2)}\n`);
    expect(JSON.parse(raw)).toEqual({
      type: "FeatureCollection",
      features: [
        {
          type: "Feature",
          geometry: { type: "Point", coordinates: [13.4, 52.5] },
          properties: { tourism: "zoo", "@id": "node/1", "@type": "node" },
        },
      ],
    });
  });
});
