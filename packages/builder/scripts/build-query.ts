/**
 * Render the default venue query to a .ql file.
 *
 * Usage: npx tsx packages/builder/scripts/build-query.ts [out.ql]
 *
 * Writes query/playquery.ql at the repository root when no path is given.
 */

import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import {
  buildPlayQuery,
  writeQueryFile,
  DEFAULT_PLAY_QUERY,
  DEFAULT_QUERY_FILE,
} from "../src/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = resolve(__dirname, "../../..");

const outPath = resolve(REPO_ROOT, process.argv[2] ?? DEFAULT_QUERY_FILE);

try {
  const query = buildPlayQuery(DEFAULT_PLAY_QUERY);
  writeQueryFile(outPath, query);
  console.log(`[query] Wrote ${outPath}`);
  console.log(`[query] Regions: ${DEFAULT_PLAY_QUERY.regions.join(", ")}`);
  console.log(`[query] Rules: ${DEFAULT_PLAY_QUERY.rules.map((r) => r.key).join(", ")}`);
} catch (err) {
  console.error(`[query] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
