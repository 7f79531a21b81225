/**
 * Runtime configuration for the ingestion engine.
 *
 * Everything the engine needs (throughput, pool size, paths) is carried in an
 * explicit IngestConfig value and passed to constructors. The CLI builds it
 * from process.env via loadConfig(); tests build it by hand.
 */

import * as fs from "fs";
import * as path from "path";
import dotenv from "dotenv";
import { ConfigError } from "./errors";

// ---------------------------------------------------------------------------
// Types & defaults
// ---------------------------------------------------------------------------

export interface IngestConfig {
  apiHost: string;
  /** Host serving the daily id exports under /p/exports */
  exportsHost: string;
  dataDir: string;
  logsDir: string;
  /** Run stamps that survive between runs */
  stateDir: string;
  secretsFile: string;
  /** Max requests per rolling second, shared by every worker */
  targetRps: number;
  maxWorkers: number;
  /** Admission window = maxWorkers × inFlightMultiplier */
  inFlightMultiplier: number;
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  timeoutMs: number;
}

export const DEFAULT_CONFIG: IngestConfig = {
  apiHost: "https://api.themoviedb.org/3",
  exportsHost: "https://files.tmdb.org",
  dataDir: "data/out",
  logsDir: "logs/fetch_tmdb",
  stateDir: "state",
  secretsFile: ".env",
  targetRps: 50,
  maxWorkers: 64,
  inFlightMultiplier: 4,
  maxRetries: 6,
  baseBackoffMs: 200,
  maxBackoffMs: 60_000,
  timeoutMs: 45_000,
};

// ---------------------------------------------------------------------------
// Environment parsing
// ---------------------------------------------------------------------------

function positiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

/**
 * Build the config from environment variables, falling back to DEFAULT_CONFIG.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const config: IngestConfig = {
    apiHost: (env.TMDB_API_HOST || DEFAULT_CONFIG.apiHost).replace(/\/+$/, ""),
    exportsHost: (env.TMDB_EXPORTS_HOST || DEFAULT_CONFIG.exportsHost).replace(/\/+$/, ""),
    dataDir: path.resolve(env.TMDB_DATA_DIR || DEFAULT_CONFIG.dataDir),
    logsDir: path.resolve(env.TMDB_LOGS_DIR || DEFAULT_CONFIG.logsDir),
    stateDir: path.resolve(env.TMDB_STATE_DIR || DEFAULT_CONFIG.stateDir),
    secretsFile: path.resolve(env.TMDB_SECRETS_FILE || DEFAULT_CONFIG.secretsFile),
    targetRps: positiveInt(env, "TMDB_TARGET_RPS", DEFAULT_CONFIG.targetRps),
    maxWorkers: positiveInt(env, "TMDB_MAX_WORKERS", DEFAULT_CONFIG.maxWorkers),
    inFlightMultiplier: positiveInt(
      env,
      "TMDB_IN_FLIGHT_MULTIPLIER",
      DEFAULT_CONFIG.inFlightMultiplier,
    ),
    maxRetries: positiveInt(env, "TMDB_MAX_RETRIES", DEFAULT_CONFIG.maxRetries),
    baseBackoffMs: positiveInt(env, "TMDB_BASE_BACKOFF_MS", DEFAULT_CONFIG.baseBackoffMs),
    maxBackoffMs: positiveInt(env, "TMDB_MAX_BACKOFF_MS", DEFAULT_CONFIG.maxBackoffMs),
    timeoutMs: positiveInt(env, "TMDB_TIMEOUT_MS", DEFAULT_CONFIG.timeoutMs),
  };

  if (config.baseBackoffMs > config.maxBackoffMs) {
    throw new ConfigError(
      `TMDB_BASE_BACKOFF_MS (${config.baseBackoffMs}) exceeds TMDB_MAX_BACKOFF_MS (${config.maxBackoffMs})`,
    );
  }

  return config;
}

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

const BEARER_KEYS = ["TMDB_BEARER", "TMDB_bearer"];

/**
 * Read the TMDB bearer token from a dotenv-format secrets file.
 * Throws ConfigError when the file or the key is missing, before any
 * network call is made.
 */
export function loadBearerToken(secretsFile: string): string {
  if (!fs.existsSync(secretsFile)) {
    throw new ConfigError(`Secrets file not found: ${secretsFile}`);
  }

  const parsed = dotenv.parse(fs.readFileSync(secretsFile));
  const raw = BEARER_KEYS.map((key) => parsed[key]).find(
    (value) => value !== undefined && value.trim() !== "",
  );

  if (!raw) {
    throw new ConfigError(`TMDB_BEARER missing from ${secretsFile}`);
  }

  // Accept both a raw token and a "Bearer "-prefixed one
  const token = raw.trim();
  return token.startsWith("Bearer ") ? token.slice("Bearer ".length).trim() : token;
}
