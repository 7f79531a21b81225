/**
 * Shared types for the ingestion engine.
 * An entity type is described once by an EntityDescriptor; the engine holds
 * the scan / target / fetch / merge algorithm for all of them.
 */

import type { JsonRecord } from "./ndjson";
import type { QueryParams } from "./tmdb-client";

/** One field or a composite of integers/strings, e.g. [id] or [series_id, season_number]. */
export type IdentityKey = readonly (string | number)[];

/** A key offered for fetching, with the parent's date when it was derived from one */
export type Candidate = {
  key: IdentityKey;
  refDate?: string | null;
};

export type TargetKind = "new" | "stale";

export type Target = {
  key: IdentityKey;
  kind: TargetKind;
};

/** Window value in a status table: a day count, or "always" to refresh every run */
export type StatusWindow = number | "always";

export type RefreshPolicy =
  | { kind: "window"; windowDays: number; dateField: string }
  | {
      kind: "status";
      statusField: string;
      dateField: string;
      windows: Readonly<Record<string, StatusWindow>>;
      defaultWindowDays: number;
    }
  | { kind: "parent"; windowDays: number }
  | { kind: "never" }
  | { kind: "rebuild" };

/**
 * Where candidate keys come from.
 *  - store: another NDJSON store (a daily id export or one this engine wrote);
 *    `extract` returns zero or more candidates per line, so listings and
 *    arithmetic derivations (1..episode_count) share one shape.
 *  - single: one unparameterized call (configuration endpoints).
 */
export type CandidateSource =
  | { kind: "store"; file: string; extract: (record: JsonRecord) => Candidate[] }
  | { kind: "single" };

export interface EntityDescriptor {
  /** Store and log name, e.g. "movie_details" */
  name: string;
  candidates: CandidateSource;
  refresh: RefreshPolicy;
  endpoint(key: IdentityKey): string;
  params?(key: IdentityKey): QueryParams | undefined;
  /** Identity key of a stored line; null when the line has none */
  keyOf(record: JsonRecord): IdentityKey | null;
  /** Payload → persisted rows for one fetched key. Pure and total. */
  project(raw: unknown, key: IdentityKey): JsonRecord[];
}

/** Stable string form of a key, used for set membership. */
export function encodeKey(key: IdentityKey): string {
  return JSON.stringify(key);
}

/** Outcome of one entity run, as written to the run log */
export interface RunSummary {
  entity: string;
  added: number;
  updated: number;
  retained: number;
  appended: number;
  total: number;
  targets: number;
  errors: Array<[string, number]>;
  warnings: Array<[string, number]>;
}
