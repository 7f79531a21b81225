/**
 * Generic ingestion engine.
 *
 * One algorithm for every entity type, parameterised by its descriptor:
 *   1. load candidate keys (listing store, derivation, or a single call)
 *   2. scan the existing store for keys and refresh-due records
 *   3. build the deduplicated target list
 *   4. copy retained lines into the temp file
 *   5. fetch targets through the sliding-window scheduler, appending rows
 *   6. rename the temp file over the store
 *   7. append the run summary to the entity's log
 *
 * Full-rebuild entities skip 2–4 and regenerate the store from scratch.
 */

import * as fs from "fs";
import * as path from "path";
import { loadCandidates } from "./candidates";
import type { IngestConfig } from "./config";
import { ErrorCounter, ProgressReporter } from "./counters";
import { dayOf } from "./dates";
import { scanExistingStore } from "./existing-state";
import { readLines } from "./ndjson";
import type { RateLimiter } from "./rate-limiter";
import { describePolicy } from "./refresh-policy";
import { appendSummaryLog } from "./run-log";
import { runSlidingWindow } from "./scheduler";
import { AtomicMergeWriter } from "./store-writer";
import { buildTargets } from "./targets";
import { TmdbClient, type FetchFn, type RequestOutcome } from "./tmdb-client";
import type { EntityDescriptor, RunSummary } from "./types";

/** Warning category for a previously stored record lost to a failed refetch */
export const DROPPED_ON_REFRESH = "dropped_on_refresh";

export interface EngineDeps {
  config: IngestConfig;
  bearer: string;
  /** Shared by every entity run in the process */
  limiter: RateLimiter;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Wall clock for "today" and the run-log date */
  now?: () => Date;
  /** Live progress sink; null disables it, undefined means stderr when a TTY */
  progressWrite?: ((text: string) => void) | null;
}

export function storePathFor(config: IngestConfig, entity: Pick<EntityDescriptor, "name">): string {
  return path.join(config.dataDir, `${entity.name}.ndjson`);
}

export function logPathFor(config: IngestConfig, entity: Pick<EntityDescriptor, "name">): string {
  return path.join(config.logsDir, `${entity.name}.log`);
}

function schedulerOptions(config: IngestConfig) {
  return {
    maxWorkers: config.maxWorkers,
    maxInFlight: config.maxWorkers * config.inFlightMultiplier,
  };
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Run one entity type end to end. Per-key failures are counted, never thrown;
 * an AuthFailureError or an I/O error aborts the run with the store untouched.
 */
export async function runEntity(entity: EntityDescriptor, deps: EngineDeps): Promise<RunSummary> {
  const runDate = (deps.now ?? (() => new Date()))();
  const errors = new ErrorCounter();
  const warnings = new ErrorCounter();
  const client = new TmdbClient({
    config: deps.config,
    bearer: deps.bearer,
    limiter: deps.limiter,
    errors,
    fetch: deps.fetch,
    sleep: deps.sleep,
    random: deps.random,
  });
  const progress = new ProgressReporter({
    label: `fetch:${entity.name}`,
    write: deps.progressWrite,
  });

  const summary =
    entity.refresh.kind === "rebuild"
      ? await rebuild(entity, deps.config, client, progress, errors, warnings)
      : await merge(entity, deps.config, client, progress, dayOf(runDate), errors, warnings);

  const line = await appendSummaryLog(logPathFor(deps.config, entity), summary, runDate);
  console.log(`[fetch:${entity.name}] ${line}`);
  return summary;
}

// ---------------------------------------------------------------------------
// Incremental merge
// ---------------------------------------------------------------------------

async function merge(
  entity: EntityDescriptor,
  config: IngestConfig,
  client: TmdbClient,
  progress: ProgressReporter,
  today: number,
  errors: ErrorCounter,
  warnings: ErrorCounter,
): Promise<RunSummary> {
  const tag = `[fetch:${entity.name}]`;
  const storePath = storePathFor(config, entity);

  const { candidates } = await loadCandidates(entity.candidates, config.dataDir);
  const existing = await scanExistingStore(storePath, entity, today, warnings);
  const plan = buildTargets(candidates, existing, entity.refresh, today);

  console.log(
    `${tag} ${candidates.length} candidates, ${existing.lines} stored, ${plan.targets.length} targets (${plan.willAdd} new, ${plan.willUpdate} refresh; ${describePolicy(entity.refresh)})`,
  );

  const base = {
    entity: entity.name,
    targets: plan.targets.length,
    errors: errors.entries(),
    warnings: warnings.entries(),
  };

  if (plan.targets.length === 0) {
    console.log(`${tag} Nothing to fetch, store unchanged`);
    return { ...base, added: 0, updated: 0, retained: existing.lines, appended: 0, total: existing.lines };
  }

  progress.set("total", plan.targets.length);
  progress.set("added", plan.willAdd);
  progress.set("updated", plan.willUpdate);

  let added = 0;
  let updated = 0;
  const writer = await AtomicMergeWriter.open(storePath);

  try {
    const retain = await writer.copyRetained(entity.keyOf, plan.keys);

    await runSlidingWindow(
      plan.targets,
      (target) => client.request(entity.endpoint(target.key), entity.params?.(target.key)),
      async (target, outcome: RequestOutcome) => {
        progress.inc("processed");
        const rows = outcome.ok ? entity.project(outcome.data, target.key) : [];
        if (rows.length > 0) {
          await writer.append(rows);
          progress.inc("ok");
          if (target.kind === "stale") updated++;
          else added++;
          progress.set("added", added);
          progress.set("updated", updated);
        } else if (target.kind === "stale") {
          // The old lines were filtered out of the merge already
          warnings.inc(DROPPED_ON_REFRESH);
        }
        progress.set("errors", errors.total());
        progress.print();
      },
      schedulerOptions(config),
    );

    await writer.commit();
    progress.finish();

    const appended = writer.appendedLines;
    console.log(
      `${tag} Wrote ${storePath} | added=${added} | updated=${updated} | kept=${retain.retained} | total=${retain.retained + appended}`,
    );

    return {
      ...base,
      errors: errors.entries(),
      warnings: warnings.entries(),
      added,
      updated,
      retained: retain.retained,
      appended,
      total: retain.retained + appended,
    };
  } catch (error) {
    progress.finish();
    await writer.abort();
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Full rebuild
// ---------------------------------------------------------------------------

async function countStoreLines(storePath: string): Promise<number> {
  if (!fs.existsSync(storePath)) return 0;
  let lines = 0;
  for await (const line of readLines(storePath)) {
    if (line.trim() !== "") lines++;
  }
  return lines;
}

async function rebuild(
  entity: EntityDescriptor,
  config: IngestConfig,
  client: TmdbClient,
  progress: ProgressReporter,
  errors: ErrorCounter,
  warnings: ErrorCounter,
): Promise<RunSummary> {
  const tag = `[fetch:${entity.name}]`;
  const storePath = storePathFor(config, entity);
  const { candidates } = await loadCandidates(entity.candidates, config.dataDir);

  console.log(`${tag} Full rebuild from ${candidates.length} call(s)`);
  progress.set("total", candidates.length);

  let succeeded = 0;
  const writer = await AtomicMergeWriter.open(storePath);

  try {
    await runSlidingWindow(
      candidates,
      (candidate) => client.request(entity.endpoint(candidate.key), entity.params?.(candidate.key)),
      async (candidate, outcome: RequestOutcome) => {
        progress.inc("processed");
        if (outcome.ok) {
          await writer.append(entity.project(outcome.data, candidate.key));
          succeeded++;
          progress.inc("ok");
          progress.set("added", writer.appendedLines);
        }
        progress.set("errors", errors.total());
        progress.print();
      },
      schedulerOptions(config),
    );
  } catch (error) {
    progress.finish();
    await writer.abort();
    throw error;
  }
  progress.finish();

  // Keep the previous store rather than replace it with nothing
  if (succeeded === 0) {
    await writer.abort();
    const kept = await countStoreLines(storePath);
    console.warn(`${tag} Every call failed, previous store kept (${kept} lines)`);
    return {
      entity: entity.name,
      targets: candidates.length,
      added: 0,
      updated: 0,
      retained: kept,
      appended: 0,
      total: kept,
      errors: errors.entries(),
      warnings: warnings.entries(),
    };
  }

  await writer.commit();
  const lines = writer.appendedLines;
  console.log(`${tag} Wrote ${storePath} | calls_ok=${succeeded}/${candidates.length} | lines=${lines}`);

  return {
    entity: entity.name,
    targets: candidates.length,
    added: lines,
    updated: 0,
    retained: 0,
    appended: lines,
    total: lines,
    errors: errors.entries(),
    warnings: warnings.entries(),
  };
}
