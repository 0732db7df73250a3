import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { checkFeatureDrop, dropPercent, readFeatureCount } from "./safety.js";
import { FeatureDropError } from "../errors.js";

function writeCollection(path: string, count: number): void {
  const features = Array.from({ length: count }, (_, i) => ({
    type: "Feature",
    geometry: { type: "Point", coordinates: [i, i] },
    properties: { "@id": `node/${i}`, "@type": "node" },
  }));
  writeFileSync(path, JSON.stringify({ type: "FeatureCollection", features }));
}

describe("feature drop safety check", () => {
  let dir: string;
  let output: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "safety-test-"));
    output = join(dir, "funmap.geojson");
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("passes when there is no previous output", () => {
    expect(() => checkFeatureDrop(1, output, 50)).not.toThrow();
  });

  it("passes when the previous output was empty", () => {
    writeCollection(output, 0);
    expect(() => checkFeatureDrop(0, output, 50)).not.toThrow();
  });

  it("passes a drop exactly at the threshold", () => {
    writeCollection(output, 10);
    expect(() => checkFeatureDrop(5, output, 50)).not.toThrow();
  });

  it("passes growth", () => {
    writeCollection(output, 10);
    expect(() => checkFeatureDrop(25, output, 0)).not.toThrow();
  });

  it("throws FeatureDropError past the threshold", () => {
    writeCollection(output, 10);

    let caught: unknown;
    try {
      checkFeatureDrop(4, output, 50);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(FeatureDropError);
    if (!(caught instanceof FeatureDropError)) return;
    expect(caught.oldCount).toBe(10);
    expect(caught.newCount).toBe(4);
    expect(caught.dropPct).toBe(60);
    expect(caught.message).toBe("Safety check failed: 10 -> 4 (60.0% drop)");
  });

  it("ignores an unreadable previous output", () => {
    writeFileSync(output, "{ not json");
    expect(readFeatureCount(output)).toBeNull();
    expect(() => checkFeatureDrop(1, output, 50)).not.toThrow();
  });
});

describe("dropPercent", () => {
  it("is negative for growth", () => {
    expect(dropPercent(4, 5)).toBe(-25);
  });
});
