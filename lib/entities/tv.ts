/**
 * TV entities. Series details carry a seasons_index that seeds the season
 * fetches; stored seasons in turn seed the episode fetches through their
 * episode_count.
 */

import { episodesOfSeason, intIdFrom, seasonsOfSeries } from "../candidates";
import type { JsonRecord } from "../ndjson";
import { field, listField, pick, selectList, selectStrictList } from "../projection";
import type { CandidateSource, EntityDescriptor, IdentityKey, StatusWindow } from "../types";
import {
  idOf,
  idWithList,
  isInt,
  keyFrom,
  parentPolicy,
  translationsOf,
  watchProviderRows,
} from "./shared";

const SERIES_STORE = "tv_series_details.ndjson";
const SEASONS_STORE = "tv_seasons_details.ndjson";

/** Refresh windows by series status, measured on last_air_date */
export const SERIES_STATUS_WINDOWS: Readonly<Record<string, StatusWindow>> = {
  "Returning Series": "always",
  "In Production": 30,
  Pilot: 90,
  Planned: 90,
  Canceled: 365,
  Ended: 180,
};

export const SERIES_DEFAULT_WINDOW_DAYS = 60;
export const SEASON_WINDOW_DAYS = 60;
export const EPISODE_WINDOW_DAYS = 60;

const SERIES_FIELDS = [
  "id",
  "name",
  "original_name",
  "original_language",
  "languages",
  "overview",
  "tagline",
  "type",
  "status",
  "in_production",
  "first_air_date",
  "last_air_date",
  "number_of_seasons",
  "number_of_episodes",
  "episode_run_time",
  "origin_country",
  "popularity",
  "vote_average",
  "vote_count",
] as const;

function keyPart(key: IdentityKey, index: number): string | number {
  const part = key[index];
  if (part === undefined) throw new RangeError(`Identity key ${JSON.stringify(key)} has no part ${index}`);
  return part;
}

export function projectSeriesDetails(raw: unknown, key: IdentityKey): JsonRecord[] {
  return [
    {
      ...pick(raw, SERIES_FIELDS),
      id: idOf(key),
      languages: listField(raw, "languages"),
      episode_run_time: listField(raw, "episode_run_time"),
      origin_country: listField(raw, "origin_country"),
      genres: selectList(field(raw, "genres"), ["id", "name"]),
      spoken_languages: selectList(field(raw, "spoken_languages"), [
        "english_name",
        "iso_639_1",
        "name",
      ]),
      networks: selectList(field(raw, "networks"), ["id", "name", "origin_country"]),
      production_companies: selectList(field(raw, "production_companies"), [
        "id",
        "name",
        "origin_country",
      ]),
      production_countries: selectList(field(raw, "production_countries"), ["iso_3166_1", "name"]),
      created_by: selectList(field(raw, "created_by"), [
        "id",
        "name",
        "original_name",
        "gender",
        "credit_id",
      ]),
      seasons_index: selectStrictList(
        field(raw, "seasons"),
        ["season_number", "id"],
        ["season_number", "id"],
      ).filter((season) => isInt(season.season_number) && isInt(season.id)),
    },
  ];
}

export function projectSeason(raw: unknown, key: IdentityKey): JsonRecord[] {
  const episodes = field(raw, "episodes");
  return [
    {
      season_id: field(raw, "id"),
      series_id: keyPart(key, 0),
      season_number: keyPart(key, 1),
      name: field(raw, "name"),
      overview: field(raw, "overview"),
      air_date: field(raw, "air_date"),
      vote_average: field(raw, "vote_average"),
      episode_count: Array.isArray(episodes) ? episodes.length : field(raw, "episode_count"),
      _id: field(raw, "_id"),
    },
  ];
}

export function projectEpisode(raw: unknown, key: IdentityKey): JsonRecord[] {
  return [
    {
      episode_id: field(raw, "id"),
      series_id: keyPart(key, 0),
      season_number: keyPart(key, 1),
      episode_number: keyPart(key, 2),
      episode_type: field(raw, "episode_type"),
      name: field(raw, "name"),
      overview: field(raw, "overview"),
      air_date: field(raw, "air_date"),
      runtime: field(raw, "runtime"),
      production_code: field(raw, "production_code"),
      vote_average: field(raw, "vote_average"),
      vote_count: field(raw, "vote_count"),
      crew: selectList(field(raw, "crew"), [
        "job",
        "department",
        "credit_id",
        "id",
        "name",
        "original_name",
        "gender",
      ]),
      guest_stars: selectList(field(raw, "guest_stars"), [
        "character",
        "credit_id",
        "order",
        "id",
        "name",
        "original_name",
        "gender",
      ]),
    },
  ];
}

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

const byId = keyFrom("id");
const fromSeries: CandidateSource = {
  kind: "store",
  file: SERIES_STORE,
  extract: intIdFrom("id", "last_air_date"),
};

function seriesChild(
  name: string,
  path: string,
  project: EntityDescriptor["project"],
): EntityDescriptor {
  return {
    name,
    candidates: fromSeries,
    refresh: parentPolicy,
    endpoint: (key) => `/tv/${idOf(key)}/${path}`,
    keyOf: byId,
    project,
  };
}

export const seriesDetails: EntityDescriptor = {
  name: "tv_series_details",
  candidates: { kind: "store", file: "tv_series_dumps.json", extract: intIdFrom("id") },
  refresh: {
    kind: "status",
    statusField: "status",
    dateField: "last_air_date",
    windows: SERIES_STATUS_WINDOWS,
    defaultWindowDays: SERIES_DEFAULT_WINDOW_DAYS,
  },
  endpoint: (key) => `/tv/${idOf(key)}`,
  keyOf: byId,
  project: projectSeriesDetails,
};

export const seasonDetails: EntityDescriptor = {
  name: "tv_seasons_details",
  candidates: { kind: "store", file: SERIES_STORE, extract: seasonsOfSeries },
  refresh: { kind: "window", windowDays: SEASON_WINDOW_DAYS, dateField: "air_date" },
  endpoint: (key) => `/tv/${keyPart(key, 0)}/season/${keyPart(key, 1)}`,
  keyOf: keyFrom("series_id", "season_number"),
  project: projectSeason,
};

export const episodeDetails: EntityDescriptor = {
  name: "tv_episodes_details",
  candidates: { kind: "store", file: SEASONS_STORE, extract: episodesOfSeason },
  refresh: { kind: "parent", windowDays: EPISODE_WINDOW_DAYS },
  endpoint: (key) =>
    `/tv/${keyPart(key, 0)}/season/${keyPart(key, 1)}/episode/${keyPart(key, 2)}`,
  keyOf: keyFrom("series_id", "season_number", "episode_number"),
  project: projectEpisode,
};

export const seriesChildren: EntityDescriptor[] = [
  seriesChild(
    "tv_series_content_ratings",
    "content_ratings",
    idWithList("content_ratings", "results", ["iso_3166_1", "rating"]),
  ),
  seriesChild(
    "tv_series_alternative_titles",
    "alternative_titles",
    idWithList("alternative_titles", "results", ["iso_3166_1", "title"]),
  ),
  seriesChild("tv_series_external_ids", "external_ids", (raw, key) => [
    { id: idOf(key), imdb_id: field(raw, "imdb_id") },
  ]),
  seriesChild("tv_series_keywords", "keywords", idWithList("keywords", "results", ["id", "name"])),
  seriesChild(
    "tv_series_reviews",
    "reviews",
    idWithList("reviews", "results", ["id", "author", "content", "created_at", "url"]),
  ),
  seriesChild(
    "tv_series_translations",
    "translations",
    translationsOf("name"),
  ),
];

export const seriesWatchProviders: EntityDescriptor = {
  name: "watch_providers_series",
  candidates: { kind: "store", file: "tv_series_dumps.json", extract: intIdFrom("id") },
  refresh: { kind: "never" },
  endpoint: (key) => `/tv/${idOf(key)}/watch/providers`,
  keyOf: keyFrom("id_series"),
  project: watchProviderRows("id_series"),
};
