/**
 * Command-line runners.
 *
 *   fetch-tmdb [--list] [entity ...]
 *     Runs every entity in dependency order, or only the ones named. Exit code
 *     0 when every requested entity ran; 1 when one was skipped for a missing
 *     input, on a configuration error, or when TMDB rejected the token; 2 for
 *     unknown entity names.
 *
 *   fetch-exports
 *     Merges today's id exports into the *_dumps.json listing stores. Exit
 *     code 1 when an export failed or the configuration is invalid.
 */

import { loadBearerToken, loadConfig, type IngestConfig } from "../lib/config";
import { runDailyExports, type DailyExportsDeps } from "../lib/daily-exports";
import { runEntity, type EngineDeps } from "../lib/engine";
import { ENTITIES, getEntity } from "../lib/entities";
import { AuthFailureError, ConfigError, MissingInputError, errorMessage } from "../lib/errors";
import { RateLimiter } from "../lib/rate-limiter";
import { describePolicy } from "../lib/refresh-policy";
import { flushSentry, reportError } from "../lib/sentry";
import type { EntityDescriptor, RunSummary } from "../lib/types";

export interface CliDeps extends Partial<Omit<EngineDeps, "config" | "bearer">> {
  env?: NodeJS.ProcessEnv;
  /** Receives every run summary, in run order */
  onSummary?: (summary: RunSummary) => void;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function selectEntities(names: string[]): EntityDescriptor[] | null {
  if (names.length === 0) return [...ENTITIES];

  const unknown = names.filter((name) => !getEntity(name));
  if (unknown.length > 0) {
    console.error(`[cli] Unknown entity: ${unknown.join(", ")} (use --list)`);
    return null;
  }
  // Keep dependency order whatever order the names were given in
  const wanted = new Set(names);
  return ENTITIES.filter((entity) => wanted.has(entity.name));
}

function printCatalog(): void {
  for (const entity of ENTITIES) {
    const source = entity.candidates.kind === "store" ? entity.candidates.file : "single call";
    console.log(`${entity.name.padEnd(30)} ${source.padEnd(34)} ${describePolicy(entity.refresh)}`);
  }
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  if (argv.includes("--list")) {
    printCatalog();
    return EXIT_OK;
  }

  const entities = selectEntities(argv.filter((arg) => !arg.startsWith("--")));
  if (!entities) return EXIT_USAGE;

  let engine: EngineDeps;
  try {
    const config = loadConfig(deps.env);
    engine = {
      ...deps,
      config,
      bearer: loadBearerToken(config.secretsFile),
      limiter: deps.limiter ?? new RateLimiter(config.targetRps),
    };
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[cli] ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  console.log(
    `[cli] Running ${entities.length} entit${entities.length === 1 ? "y" : "ies"} | data=${engine.config.dataDir} | rps=${engine.config.targetRps} | workers=${engine.config.maxWorkers}`,
  );

  const skipped: string[] = [];
  for (const entity of entities) {
    try {
      const summary = await runEntity(entity, engine);
      deps.onSummary?.(summary);
    } catch (error) {
      if (error instanceof MissingInputError) {
        console.warn(`[cli] Skipping ${entity.name}: ${error.message}`);
        reportError(error, entity.name);
        skipped.push(entity.name);
        continue;
      }
      if (error instanceof AuthFailureError) {
        console.error(`[cli] ${error.message}`);
        reportError(error, entity.name);
        return EXIT_FAILURE;
      }
      console.error(`[cli] ${entity.name} failed: ${errorMessage(error)}`);
      reportError(error, entity.name);
      throw error;
    }
  }

  if (skipped.length > 0) {
    console.warn(`[cli] Finished with ${skipped.length} skipped: ${skipped.join(", ")}`);
    return EXIT_FAILURE;
  }
  console.log("[cli] Finished");
  return EXIT_OK;
}

// ---------------------------------------------------------------------------
// Daily exports
// ---------------------------------------------------------------------------

export interface ExportsCliDeps extends Omit<DailyExportsDeps, "config"> {
  env?: NodeJS.ProcessEnv;
}

export async function runExportsCli(deps: ExportsCliDeps = {}): Promise<number> {
  let config: IngestConfig;
  try {
    config = loadConfig(deps.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[cli] ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const report = await runDailyExports({ ...deps, config });
  const failed = report.results.filter((result) => result.status === "error");
  if (failed.length > 0) {
    console.warn(`[cli] ${failed.length} export(s) failed: ${failed.map((result) => result.label).join(", ")}`);
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}

/** Run a CLI, then wait for queued error reports whether it returned or threw. */
export async function runAndFlush(run: () => Promise<number>): Promise<number> {
  try {
    return await run();
  } finally {
    await flushSentry();
  }
}
