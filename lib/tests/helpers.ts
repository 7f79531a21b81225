import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { IngestConfig } from "../config";
import { DEFAULT_CONFIG } from "../config";
import { dayOf } from "../dates";
import type { JsonRecord } from "../ndjson";
import type { FetchFn } from "../tmdb-client";

const MS_PER_DAY = 86_400_000;

/** Fixed clock for every test run */
export const NOW = new Date("2026-10-18T12:00:00Z");
export const TODAY = dayOf(NOW);

/** `YYYY-MM-DD` for `days` before NOW (negative for the future). */
export function daysAgo(days: number): string {
  return new Date((TODAY - days) * MS_PER_DAY).toISOString().slice(0, 10);
}

export function makeTempDir(prefix = "tmdb-ingest-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(root: string, overrides: Partial<IngestConfig> = {}): IngestConfig {
  return {
    ...DEFAULT_CONFIG,
    apiHost: "https://tmdb.test/3",
    exportsHost: "https://files.tmdb.test",
    dataDir: path.join(root, "data"),
    logsDir: path.join(root, "logs"),
    stateDir: path.join(root, "state"),
    secretsFile: path.join(root, "secrets.env"),
    targetRps: 1000,
    maxWorkers: 4,
    inFlightMultiplier: 2,
    maxRetries: 3,
    baseBackoffMs: 10,
    maxBackoffMs: 100,
    ...overrides,
  };
}

export function writeNdjson(filePath: string, rows: readonly (JsonRecord | string)[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const text = rows.map((row) => (typeof row === "string" ? row : JSON.stringify(row))).join("\n");
  fs.writeFileSync(filePath, rows.length > 0 ? `${text}\n` : "", "utf-8");
}

export function readNdjson(filePath: string): JsonRecord[] {
  return fs
    .readFileSync(filePath, "utf-8")
    .split("\n")
    .filter((line) => line.trim() !== "")
    .map((line): JsonRecord => JSON.parse(line));
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export type Route = (url: URL) => Response | Promise<Response>;

/** Route answering the same JSON body on every call. */
export function respond(body: unknown, status = 200, headers: Record<string, string> = {}): Route {
  return () => jsonResponse(body, status, headers);
}

/**
 * In-process stand-in for the TMDB API: maps a pathname (after /3) to a
 * route and answers 404 for anything else. Every requested URL is recorded.
 */
export function fakeTmdb(routes: Record<string, Route>): FetchFn & { calls: string[] } {
  const calls: string[] = [];
  const handler = async (input: string): Promise<Response> => {
    calls.push(input);
    const url = new URL(input);
    const route = routes[url.pathname.replace(/^\/3/, "")];
    if (!route) return jsonResponse({ status_message: "not found" }, 404);
    return route(url);
  };
  return Object.assign(handler, { calls });
}
