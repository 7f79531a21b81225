/**
 * Daily id exports run.
 *
 * Downloads today's TMDB id exports and merges them into the *_dumps.json
 * listing stores that fetch-tmdb reads its candidates from. A second run on
 * the same UTC day is skipped.
 *
 * Run: npm run fetch:exports
 */

import "dotenv/config";
import { initSentry } from "../lib/sentry";
import { runAndFlush, runExportsCli } from "./cli";

async function main(): Promise<void> {
  initSentry();
  process.exitCode = await runAndFlush(() => runExportsCli());
}

main().catch((error) => {
  console.error("[cli] Fatal error:", error);
  process.exit(1);
});
