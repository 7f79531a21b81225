/**
 * TMDB request executor.
 *
 * One call = one logical GET, retried on 429 and network failures with
 * jittered exponential backoff. Every attempt goes through the shared rate
 * limiter first. Per-key failures come back as counted outcomes; only a 401
 * is thrown, because a bad token fails every other call too.
 */

import type { IngestConfig } from "./config";
import type { ErrorCounter } from "./counters";
import { AuthFailureError, errorMessage } from "./errors";
import { sleep as defaultSleep, type RateLimiter } from "./rate-limiter";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number>;

/** Failure categories as they appear in the run log */
export const FAILURE = {
  notFound: "404",
  rateLimitExhausted: "HTTP_429_exceeded_retries",
  network: "network_error",
  invalidJson: "invalid_json",
} as const;

export type RequestOutcome =
  | { ok: true; data: unknown }
  | { ok: false; category: string };

export interface TmdbClientOptions {
  config: Pick<
    IngestConfig,
    "apiHost" | "maxRetries" | "baseBackoffMs" | "maxBackoffMs" | "timeoutMs"
  >;
  bearer: string;
  limiter: RateLimiter;
  errors: ErrorCounter;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

const USER_AGENT = "tmdb-ingest/0.1";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function buildUrl(apiHost: string, endpoint: string, params?: QueryParams): string {
  const url = `${apiHost}${endpoint}`;
  if (!params) return url;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  const query = search.toString();
  return query ? `${url}?${query}` : url;
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 * Returns milliseconds to wait, or null when absent or unparseable.
 */
export function parseRetryAfter(value: string | null, now: number): number | null {
  if (value === null || value.trim() === "") return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1_000);
  const at = Date.parse(value);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class TmdbClient {
  private readonly options: TmdbClientOptions;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(options: TmdbClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  async request(endpoint: string, params?: QueryParams): Promise<RequestOutcome> {
    const { config, bearer, limiter } = this.options;
    const url = buildUrl(config.apiHost, endpoint, params);
    const headers = {
      Authorization: `Bearer ${bearer}`,
      Accept: "application/json",
      "User-Agent": USER_AGENT,
    };

    let backoff = config.baseBackoffMs;

    for (let attempt = 1; ; attempt++) {
      const canRetry = attempt < config.maxRetries;
      await limiter.acquire();

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers,
          signal: AbortSignal.timeout(config.timeoutMs),
        });
      } catch (error) {
        // Network error or socket timeout
        if (!canRetry) return this.fail(FAILURE.network);
        const delay = Math.min(backoff, config.maxBackoffMs);
        console.warn(
          `[tmdb] Network error for ${endpoint} (${errorMessage(error)}), retrying in ${Math.round(delay)}ms (attempt ${attempt}/${config.maxRetries})`,
        );
        await this.sleep(delay);
        backoff = this.grow(backoff);
        continue;
      }

      if (response.ok) {
        try {
          return { ok: true, data: await response.json() };
        } catch {
          if (!canRetry) return this.fail(FAILURE.invalidJson);
          await this.sleep(Math.min(backoff, config.maxBackoffMs));
          backoff = this.grow(backoff);
          continue;
        }
      }

      if (response.status === 404) return this.fail(FAILURE.notFound);

      if (response.status === 401) throw new AuthFailureError(endpoint);

      if (response.status === 429) {
        if (!canRetry) return this.fail(FAILURE.rateLimitExhausted);
        const hinted = parseRetryAfter(response.headers.get("Retry-After"), this.now());
        const delay = Math.min(hinted ?? backoff, config.maxBackoffMs);
        console.warn(
          `[tmdb] HTTP 429 for ${endpoint}, retrying in ${Math.round(delay)}ms (attempt ${attempt}/${config.maxRetries})`,
        );
        await this.sleep(delay);
        backoff = this.grow(backoff);
        continue;
      }

      // Any other status: don't retry
      return this.fail(`HTTP_${response.status}`);
    }
  }

  private grow(backoff: number): number {
    return Math.min(this.options.config.maxBackoffMs, backoff * (1.5 + this.random() * 0.5));
  }

  private fail(category: string): RequestOutcome {
    this.options.errors.inc(category);
    return { ok: false, category };
  }
}
