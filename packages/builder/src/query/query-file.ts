/**
 * Reading and writing .ql query files.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { QueryFileError } from "../errors.js";

/** Default query location, relative to the repository root */
export const DEFAULT_QUERY_FILE = "query/playquery.ql";

/**
 * Whether a query asks for `out center`, ignoring whitespace and case.
 *
 * Without it Overpass returns ways and relations with no coordinate,
 * and they are dropped during conversion.
 */
export function hasCenterOutput(query: string): boolean {
  return query.replace(/\s+/g, "").toLowerCase().includes("outcenter");
}

/**
 * Read a query file.
 *
 * @returns The trimmed query text
 * @throws QueryFileError if the file is missing or empty
 */
export function readQueryFile(path: string): string {
  if (!existsSync(path)) {
    throw new QueryFileError(path, `Query file '${path}' not found`);
  }

  const query = readFileSync(path, "utf-8").trim();
  if (!query) {
    throw new QueryFileError(path, `Query file '${path}' is empty`);
  }

  if (!hasCenterOutput(query)) {
    console.warn(
      "[query] Query does not appear to include 'out center;'. Ways/relations may be skipped."
    );
  }

  return query;
}

/**
 * Write a query file, creating parent directories as needed.
 */
export function writeQueryFile(path: string, query: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${query}\n`);
}
