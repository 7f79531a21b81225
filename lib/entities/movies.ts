/**
 * Movie entities: details from the daily id export, then children keyed by
 * the stored details and refreshed on the movie's release_date.
 */

import { intIdFrom } from "../candidates";
import type { JsonRecord } from "../ndjson";
import { field, pick, selectList } from "../projection";
import type { CandidateSource, EntityDescriptor, IdentityKey } from "../types";
import {
  idOf,
  idWithList,
  keyFrom,
  parentPolicy,
  translationsOf,
  watchProviderRows,
} from "./shared";

const DETAILS_STORE = "movie_details.ndjson";

const DETAIL_FIELDS = [
  "budget",
  "id",
  "imdb_id",
  "original_language",
  "original_title",
  "overview",
  "popularity",
  "release_date",
  "revenue",
  "runtime",
  "status",
  "tagline",
  "title",
  "vote_average",
  "vote_count",
] as const;

export function projectMovieDetails(raw: unknown, key: IdentityKey): JsonRecord[] {
  return [
    {
      ...pick(raw, DETAIL_FIELDS),
      id: idOf(key),
      genres: selectList(field(raw, "genres"), ["id", "name"]),
      production_companies: selectList(field(raw, "production_companies"), [
        "id",
        "name",
        "origin_country",
      ]),
      production_countries: selectList(field(raw, "production_countries"), ["iso_3166_1", "name"]),
      spoken_languages: selectList(field(raw, "spoken_languages"), [
        "english_name",
        "iso_639_1",
        "name",
      ]),
    },
  ];
}

export function projectMovieReleaseDates(raw: unknown, key: IdentityKey): JsonRecord[] {
  const releaseDates: JsonRecord[] = [];
  for (const country of selectList(field(raw, "results"), ["iso_3166_1", "release_dates"])) {
    for (const release of selectList(country.release_dates, ["release_date", "type", "certification"])) {
      releaseDates.push({
        iso_3166_1: country.iso_3166_1,
        release_date: release.release_date,
        type: release.type,
        certification: release.certification,
      });
    }
  }
  return [{ id: idOf(key), release_dates: releaseDates }];
}

export const projectMovieTranslations = translationsOf("title");

export function projectMovieCredits(raw: unknown, key: IdentityKey): JsonRecord[] {
  return [
    {
      id: idOf(key),
      cast: selectList(field(raw, "cast"), ["credit_id", "id", "character", "order"]),
      crew: selectList(field(raw, "crew"), ["credit_id", "id", "department", "job"]),
    },
  ];
}

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

const byId = keyFrom("id");
const fromDetails: CandidateSource = {
  kind: "store",
  file: DETAILS_STORE,
  extract: intIdFrom("id", "release_date"),
};

function movieChild(
  name: string,
  path: string,
  project: EntityDescriptor["project"],
): EntityDescriptor {
  return {
    name,
    candidates: fromDetails,
    refresh: parentPolicy,
    endpoint: (key) => `/movie/${idOf(key)}/${path}`,
    keyOf: byId,
    project,
  };
}

export const movieEntities: EntityDescriptor[] = [
  {
    name: "movie_details",
    candidates: { kind: "store", file: "movie_dumps.json", extract: intIdFrom("id") },
    refresh: { kind: "window", windowDays: 30, dateField: "release_date" },
    endpoint: (key) => `/movie/${idOf(key)}`,
    keyOf: byId,
    project: projectMovieDetails,
  },
  movieChild("movie_credits", "credits", projectMovieCredits),
  movieChild("movie_release_dates", "release_dates", projectMovieReleaseDates),
  movieChild("movie_translations", "translations", projectMovieTranslations),
  movieChild(
    "movie_alternative_titles",
    "alternative_titles",
    idWithList("titles", "titles", ["iso_3166_1", "title"]),
  ),
  movieChild("movie_keywords", "keywords", idWithList("keywords", "keywords", ["id", "name"])),
  movieChild("movie_external_ids", "external_ids", (raw, key) => [
    { id: idOf(key), imdb_id: field(raw, "imdb_id") },
  ]),
  movieChild(
    "movie_reviews",
    "reviews",
    (raw, key) => [
      {
        id: idOf(key),
        reviews: selectList(field(raw, "results"), ["id", "author", "content", "created_at", "url"]).map(
          ({ id, ...rest }) => ({ review_id: id, ...rest }),
        ),
      },
    ],
  ),
  {
    name: "watch_providers_movies",
    candidates: { kind: "store", file: "movie_dumps.json", extract: intIdFrom("id") },
    refresh: { kind: "never" },
    endpoint: (key) => `/movie/${idOf(key)}/watch/providers`,
    keyOf: keyFrom("id_movie"),
    project: watchProviderRows("id_movie"),
  },
];
