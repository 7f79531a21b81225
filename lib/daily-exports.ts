/**
 * Daily id exports.
 *
 * TMDB publishes one gzipped JSON-lines file per domain every day at
 * `/p/exports/<prefix>_MM_DD_YYYY.json.gz`. Each export is merged into its
 * `*_dumps.json` listing store, which the entity runs read their candidate
 * ids from. A merge keeps every stored id, adds the ids it has not seen, and
 * writes through AtomicMergeWriter, so a failed export leaves its store as it
 * was.
 *
 * A stamp file records the last day with at least one successful export; a
 * second run on the same UTC day does nothing.
 */

import * as fs from "fs";
import * as path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import * as zlib from "zlib";
import type { IngestConfig } from "./config";
import { errorMessage } from "./errors";
import { parseRecord, readLines, type JsonRecord } from "./ndjson";
import { sleep as defaultSleep } from "./rate-limiter";
import { reportError } from "./sentry";
import { AtomicMergeWriter } from "./store-writer";
import type { FetchFn } from "./tmdb-client";

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export interface DailyExport {
  label: string;
  /** File prefix on the exports host */
  prefix: string;
  /** Listing store in the data dir */
  file: string;
  normalize: (record: JsonRecord) => JsonRecord;
}

/** Fill `field` from `source` when the export line only has the original. */
function copyIfMissing(field: string, source: string) {
  return (record: JsonRecord): JsonRecord =>
    field in record || !(source in record) ? record : { ...record, [field]: record[source] ?? "" };
}

function nameOrOriginal(record: JsonRecord): JsonRecord {
  if ("name" in record) return record;
  return { ...record, name: record.original_name ?? record.original_title ?? "" };
}

export const DAILY_EXPORTS: readonly DailyExport[] = [
  {
    label: "movies",
    prefix: "movie_ids",
    file: "movie_dumps.json",
    normalize: copyIfMissing("title", "original_title"),
  },
  {
    label: "tv_series",
    prefix: "tv_series_ids",
    file: "tv_series_dumps.json",
    normalize: copyIfMissing("name", "original_name"),
  },
  { label: "people", prefix: "person_ids", file: "people_dumps.json", normalize: nameOrOriginal },
  {
    label: "tv_networks",
    prefix: "tv_network_ids",
    file: "tv_networks_dumps.json",
    normalize: nameOrOriginal,
  },
  { label: "keywords", prefix: "keyword_ids", file: "keywords_dumps.json", normalize: nameOrOriginal },
  {
    label: "production_companies",
    prefix: "production_company_ids",
    file: "production_companies_dumps.json",
    normalize: nameOrOriginal,
  },
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DOWNLOAD_RETRIES = 5;
const DOWNLOAD_RETRY_DELAY_MS = 2_000;
const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const APPEND_BATCH = 1_000;

/** UTC `YYYY-MM-DD` */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function exportUrl(host: string, prefix: string, date: Date): string {
  const [yyyy, mm, dd] = utcDay(date).split("-");
  return `${host}/p/exports/${prefix}_${mm}_${dd}_${yyyy}.json.gz`;
}

/** Export ids are integers, sometimes written as strings. */
function exportId(record: JsonRecord | null): number | null {
  const raw = record?.id;
  const id = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  return typeof id === "number" && Number.isInteger(id) ? id : null;
}

export function stampPathFor(config: Pick<IngestConfig, "stateDir">): string {
  return path.join(config.stateDir, "last_success_date.txt");
}

export function exportsLogPathFor(config: Pick<IngestConfig, "logsDir">): string {
  return path.join(config.logsDir, "fetch_dumps.log");
}

// ---------------------------------------------------------------------------
// Download
// ---------------------------------------------------------------------------

type Download = { ok: true; body: Buffer } | { ok: false; reason: string };

async function download(
  url: string,
  fetchImpl: FetchFn,
  wait: (ms: number) => Promise<void>,
  timeoutMs: number,
): Promise<Download> {
  for (let attempt = 0; ; attempt++) {
    const canRetry = attempt < DOWNLOAD_RETRIES;
    let response: Response;
    try {
      response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (!canRetry) return { ok: false, reason: `network_error (${errorMessage(error)})` };
      await wait(DOWNLOAD_RETRY_DELAY_MS);
      continue;
    }

    if (response.ok) return { ok: true, body: Buffer.from(await response.arrayBuffer()) };
    if (canRetry && RETRYABLE_STATUSES.has(response.status)) {
      await wait(DOWNLOAD_RETRY_DELAY_MS);
      continue;
    }
    return { ok: false, reason: `HTTP_${response.status}` };
  }
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

export interface MergeCounts {
  added: number;
  total: number;
}

/**
 * Merge the gunzipped export `body` into `storePath`. Stored lines come first,
 * with repeated ids dropped; export lines follow for ids not seen yet.
 */
export async function mergeExport(
  entry: Pick<DailyExport, "normalize">,
  body: Buffer,
  storePath: string,
): Promise<MergeCounts> {
  const sourcePath = `${storePath}.src.tmp`;
  const seen = new Set<number>();
  const counts: MergeCounts = { added: 0, total: 0 };
  let batch: JsonRecord[] = [];

  const writer = await AtomicMergeWriter.open(storePath);

  const take = async (line: string): Promise<boolean> => {
    if (line.trim() === "") return false;
    const record = parseRecord(line);
    const id = exportId(record);
    if (record === null || id === null || seen.has(id)) return false;
    seen.add(id);
    batch.push({ ...entry.normalize(record), id });
    counts.total++;
    if (batch.length >= APPEND_BATCH) {
      await writer.append(batch);
      batch = [];
    }
    return true;
  };

  try {
    await pipeline(Readable.from([body]), zlib.createGunzip(), fs.createWriteStream(sourcePath));

    if (fs.existsSync(storePath)) {
      for await (const line of readLines(storePath)) await take(line);
    }
    for await (const line of readLines(sourcePath)) {
      if (await take(line)) counts.added++;
    }
    await writer.append(batch);
    await writer.commit();
  } catch (error) {
    await writer.abort();
    throw error;
  } finally {
    await fs.promises.rm(sourcePath, { force: true });
  }

  return counts;
}

// ---------------------------------------------------------------------------
// Daily run
// ---------------------------------------------------------------------------

export interface DailyExportsDeps {
  config: Pick<IngestConfig, "exportsHost" | "dataDir" | "logsDir" | "stateDir" | "timeoutMs">;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export type ExportResult =
  | ({ label: string; status: "ok" } & MergeCounts)
  | { label: string; status: "error"; reason: string };

export interface DailyExportsReport {
  day: string;
  /** Already done earlier the same day */
  skipped: boolean;
  results: ExportResult[];
}

export async function runDailyExports(
  deps: DailyExportsDeps,
  exportsToRun: readonly DailyExport[] = DAILY_EXPORTS,
): Promise<DailyExportsReport> {
  const { config } = deps;
  const now = deps.now ?? (() => new Date());
  const fetchImpl: FetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
  const wait = deps.sleep ?? defaultSleep;
  const runDate = now();
  const day = utcDay(runDate);
  const stampPath = stampPathFor(config);
  const logPath = exportsLogPathFor(config);

  await fs.promises.mkdir(path.dirname(logPath), { recursive: true });
  const log = async (message: string): Promise<void> => {
    const at = now().toISOString().replace("T", " ").slice(0, 19);
    await fs.promises.appendFile(logPath, `${at} | ${message}\n`, "utf-8");
    console.log(`[exports] ${message}`);
  };

  if (fs.existsSync(stampPath) && (await fs.promises.readFile(stampPath, "utf-8")).trim() === day) {
    await log(`SKIP already done for ${day}`);
    return { day, skipped: true, results: [] };
  }

  const results: ExportResult[] = [];
  for (const entry of exportsToRun) {
    const url = exportUrl(config.exportsHost, entry.prefix, runDate);
    const fetched = await download(url, fetchImpl, wait, config.timeoutMs);
    if (!fetched.ok) {
      await log(`ERROR ${entry.label} ${day} download failed: ${fetched.reason}`);
      results.push({ label: entry.label, status: "error", reason: fetched.reason });
      continue;
    }

    try {
      const counts = await mergeExport(entry, fetched.body, path.join(config.dataDir, entry.file));
      await log(`OK ${entry.label} ${day} added=${counts.added} total=${counts.total}`);
      results.push({ label: entry.label, status: "ok", ...counts });
    } catch (error) {
      // Corrupt archive or disk failure: this store is untouched, the others go on
      await log(`ERROR ${entry.label} ${day} merge failed: ${errorMessage(error)}`);
      reportError(error, `exports:${entry.label}`);
      results.push({ label: entry.label, status: "error", reason: errorMessage(error) });
    }
  }

  if (results.some((result) => result.status === "ok")) {
    await fs.promises.mkdir(path.dirname(stampPath), { recursive: true });
    await fs.promises.writeFile(stampPath, `${day}\n`, "utf-8");
  }

  return { day, skipped: false, results };
}
