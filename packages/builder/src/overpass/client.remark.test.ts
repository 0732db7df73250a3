import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OverpassRuntimeError } from "overpass-ts";
import { OverpassRemarkError, OverpassTimeoutError } from "../errors.js";
import { node, overpassResponse } from "../testing/overpass-fixtures.js";
import { DEFAULT_ENDPOINT, runOverpassQuery } from "./client.js";

// No vi.mock here: these go through overpass-ts with only fetch replaced.

const REMARK = 'runtime error: Query timed out in "query" at line 3 after 181 seconds.';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

describe("runOverpassQuery against overpass-ts", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns a clean payload", async () => {
    const response = overpassResponse([node(1, 52.5, 13.4, { tourism: "zoo" })]);
    mockFetch.mockImplementation(async () => jsonResponse(response));

    const data = await runOverpassQuery("node(1);out center;");
    expect(data).toEqual(response);
    expect(String(mockFetch.mock.calls[0]?.[0]).startsWith(DEFAULT_ENDPOINT)).toBe(true);
  });

  it("raises the in-band remark verbatim", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ ...overpassResponse([]), remark: REMARK }));

    const err = await runOverpassQuery("q", { endpoint: "https://a.example.test/api/interpreter" })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OverpassRemarkError);
    if (!(err instanceof OverpassRemarkError)) return;
    expect(err.remark).toBe(REMARK);
    expect(err.endpoint).toBe("https://a.example.test/api/interpreter");
    expect(err.cause).toBeInstanceOf(OverpassRuntimeError);
  });

  it("gives up on an endpoint that never answers", async () => {
    mockFetch.mockReturnValue(new Promise(() => {}));

    const err = await runOverpassQuery("q", { timeoutMs: 20 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OverpassTimeoutError);
    if (!(err instanceof OverpassTimeoutError)) return;
    expect(err.endpoint).toBe(DEFAULT_ENDPOINT);
    expect(err.message).toBe(`Overpass request to ${DEFAULT_ENDPOINT} timed out after 20 ms`);
  });
});
