/**
 * Reference data: configuration lists, certifications and genre names.
 * These stores are small and rebuilt in full on every run.
 */

import { stringIdFrom } from "../candidates";
import { isPlainObject, type JsonRecord } from "../ndjson";
import { field, selectStrictList } from "../projection";
import type { EntityDescriptor, IdentityKey } from "../types";
import { idOf, isInt, keyFrom } from "./shared";

/** Configuration endpoints answer with a bare array. */
function rowsOf(raw: unknown, keys: readonly string[]): JsonRecord[] {
  return selectStrictList(raw, keys, keys).filter((row) =>
    keys.every((name) => typeof row[name] === "string"),
  );
}

export function projectLanguages(raw: unknown): JsonRecord[] {
  return rowsOf(raw, ["iso_639_1", "english_name", "name"]);
}

export function projectCountries(raw: unknown): JsonRecord[] {
  return rowsOf(raw, ["iso_3166_1", "english_name", "native_name"]);
}

/** `{ certifications: { US: [{ certification, meaning, order }] } }` → one row per country and rating. */
export function projectCertifications(raw: unknown): JsonRecord[] {
  const byCountry = field(raw, "certifications");
  if (!isPlainObject(byCountry)) return [];

  const rows: JsonRecord[] = [];
  for (const [countryCode, list] of Object.entries(byCountry)) {
    for (const entry of selectStrictList(list, ["certification", "meaning", "order"], ["certification"])) {
      rows.push({ country_code: countryCode, ...entry });
    }
  }
  return rows;
}

/** Genre names in the requested language, tagged with it. */
export function projectGenres(raw: unknown, key: IdentityKey): JsonRecord[] {
  const language = idOf(key);
  return selectStrictList(field(raw, "genres"), ["id", "name"], ["id", "name"])
    .filter((genre) => isInt(genre.id) && typeof genre.name === "string")
    .map((genre) => ({ iso_639_1: language, id: genre.id, name: genre.name }));
}

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

function configurationList(
  name: string,
  endpoint: string,
  keyFields: string[],
  project: (raw: unknown) => JsonRecord[],
): EntityDescriptor {
  return {
    name,
    candidates: { kind: "single" },
    refresh: { kind: "rebuild" },
    endpoint: () => endpoint,
    keyOf: keyFrom(...keyFields),
    project,
  };
}

function genreList(name: string, endpoint: string): EntityDescriptor {
  return {
    name,
    candidates: { kind: "store", file: "ref_languages.ndjson", extract: stringIdFrom("iso_639_1") },
    refresh: { kind: "rebuild" },
    endpoint: () => endpoint,
    params: (key) => ({ language: idOf(key) }),
    keyOf: keyFrom("iso_639_1", "id"),
    project: projectGenres,
  };
}

export const referenceEntities: EntityDescriptor[] = [
  configurationList("ref_languages", "/configuration/languages", ["iso_639_1"], projectLanguages),
  configurationList("ref_countries", "/configuration/countries", ["iso_3166_1"], projectCountries),
  configurationList(
    "certification_movies",
    "/certification/movie/list",
    ["country_code", "certification"],
    projectCertifications,
  ),
  configurationList(
    "certification_series",
    "/certification/tv/list",
    ["country_code", "certification"],
    projectCertifications,
  ),
  genreList("ref_genre_movies", "/genre/movie/list"),
  genreList("ref_genre_series", "/genre/tv/list"),
];
