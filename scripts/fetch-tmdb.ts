/**
 * TMDB ingestion run.
 *
 * Fetches every entity type (or the ones named as arguments) into the NDJSON
 * stores under TMDB_DATA_DIR, merging with what earlier runs wrote.
 *
 * Run: npm run fetch -- [--list] [entity ...]
 */

import "dotenv/config";
import { initSentry } from "../lib/sentry";
import { runAndFlush, runCli } from "./cli";

async function main(): Promise<void> {
  initSentry();
  process.exitCode = await runAndFlush(() => runCli(process.argv.slice(2)));
}

main().catch((error) => {
  console.error("[cli] Fatal error:", error);
  process.exit(1);
});
