/**
 * Candidate keys for an entity run: read from a listing store or derived
 * from a parent store, deduplicated in first-seen order.
 */

import * as fs from "fs";
import * as path from "path";
import { MissingInputError } from "./errors";
import { isPlainObject, parseRecord, readLines, type JsonRecord } from "./ndjson";
import { encodeKey, type Candidate, type CandidateSource, type IdentityKey } from "./types";

export interface CandidateLoad {
  candidates: Candidate[];
  invalidLines: number;
  unusableLines: number;
}

export async function loadCandidates(
  source: CandidateSource,
  dataDir: string,
): Promise<CandidateLoad> {
  if (source.kind === "single") {
    return { candidates: [{ key: [] }], invalidLines: 0, unusableLines: 0 };
  }

  const inputPath = path.join(dataDir, source.file);
  if (!fs.existsSync(inputPath)) {
    throw new MissingInputError(inputPath, "Input file not found");
  }

  const seen = new Set<string>();
  const candidates: Candidate[] = [];
  let invalidLines = 0;
  let unusableLines = 0;

  for await (const line of readLines(inputPath)) {
    if (line.trim() === "") continue;
    const record = parseRecord(line);
    if (!record) {
      invalidLines++;
      continue;
    }
    const extracted = source.extract(record);
    if (extracted.length === 0) {
      unusableLines++;
      continue;
    }
    for (const candidate of extracted) {
      const encoded = encodeKey(candidate.key);
      if (seen.has(encoded)) continue;
      seen.add(encoded);
      candidates.push(candidate);
    }
  }

  if (invalidLines > 0 || unusableLines > 0) {
    console.warn(
      `[candidates] ${source.file}: ${invalidLines} invalid JSON lines, ${unusableLines} without a usable key`,
    );
  }

  if (candidates.length === 0) {
    throw new MissingInputError(inputPath, "No candidate keys found");
  }

  return { candidates, invalidLines, unusableLines };
}

// ---------------------------------------------------------------------------
// Extractors used by the entity catalog
// ---------------------------------------------------------------------------

function isInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function dateOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/** One integer id per line, optionally carrying a date field as the parent date. */
export function intIdFrom(field: string, refDateField?: string) {
  return (record: JsonRecord): Candidate[] => {
    const id = record[field];
    if (!isInt(id)) return [];
    return [{ key: [id], refDate: refDateField ? dateOrNull(record[refDateField]) : null }];
  };
}

/** One string code per line, e.g. a language's iso_639_1. */
export function stringIdFrom(field: string) {
  return (record: JsonRecord): Candidate[] => {
    const code = record[field];
    if (typeof code !== "string" || code === "") return [];
    return [{ key: [code] }];
  };
}

/** (series_id, season_number) pairs from a series' seasons_index. */
export function seasonsOfSeries(record: JsonRecord): Candidate[] {
  const seriesId = record.id;
  const index = record.seasons_index;
  if (!isInt(seriesId) || !Array.isArray(index)) return [];
  const out: Candidate[] = [];
  for (const season of index) {
    if (isPlainObject(season) && isInt(season.season_number)) {
      out.push({ key: [seriesId, season.season_number] });
    }
  }
  return out;
}

/**
 * (series_id, season_number, 1..episode_count) triples from a stored season,
 * carrying the season's air_date because an episode's own date is unknown
 * until it is fetched.
 */
export function episodesOfSeason(record: JsonRecord): Candidate[] {
  const { series_id: seriesId, season_number: seasonNumber, episode_count: count } = record;
  if (!isInt(seriesId) || !isInt(seasonNumber) || !isInt(count) || count < 0) return [];
  const refDate = dateOrNull(record.air_date);
  const out: Candidate[] = [];
  for (let episode = 1; episode <= count; episode++) {
    const key: IdentityKey = [seriesId, seasonNumber, episode];
    out.push({ key, refDate });
  }
  return out;
}
