import { describe, expect, it } from "vitest";
import { ENTITIES, getEntity } from "../entities";
import { projectCompany, projectPerson } from "../entities/catalog";
import { projectMovieDetails, projectMovieReleaseDates, projectMovieTranslations } from "../entities/movies";
import {
  projectCertifications,
  projectCountries,
  projectGenres,
  projectLanguages,
} from "../entities/reference";
import { watchProviderRows } from "../entities/shared";
import { projectEpisode, projectSeason, projectSeriesDetails } from "../entities/tv";
import { field, pick, selectList, selectStrictList } from "../projection";

describe("projection helpers", () => {
  it("reads absent fields as null", () => {
    expect(field({ a: 1 }, "b")).toBeNull();
    expect(field("not an object", "a")).toBeNull();
    expect(pick({ a: 1, c: 3 }, ["a", "b"])).toEqual({ a: 1, b: null });
  });

  it("keeps allow-listed keys of object items only", () => {
    expect(selectList([{ id: 1, name: "x", extra: true }, "skip", null], ["id", "name"])).toEqual([
      { id: 1, name: "x" },
    ]);
    expect(selectList("not a list", ["id"])).toEqual([]);
  });

  it("drops items missing a required key", () => {
    expect(
      selectStrictList([{ id: 1, name: "a" }, { id: null, name: "b" }, { name: "c" }], ["id", "name"], ["id"]),
    ).toEqual([{ id: 1, name: "a" }]);
  });
});

describe("movie projections", () => {
  it("keeps the detail fields and trims nested lists", () => {
    const [row] = projectMovieDetails(
      {
        id: 550,
        title: "Test Movie",
        release_date: "1999-10-15",
        genres: [{ id: 18, name: "Drama" }],
        production_companies: [{ id: 1, name: "Co", origin_country: "US", logo_path: "/x.png" }],
        adult: false,
      },
      [550],
    );

    expect(row).toMatchObject({
      id: 550,
      title: "Test Movie",
      release_date: "1999-10-15",
      budget: null,
      genres: [{ id: 18, name: "Drama" }],
      production_companies: [{ id: 1, name: "Co", origin_country: "US" }],
      production_countries: [],
    });
    expect(row).not.toHaveProperty("adult");
  });

  it("flattens release dates per country", () => {
    const rows = projectMovieReleaseDates(
      {
        id: 550,
        results: [
          {
            iso_3166_1: "US",
            release_dates: [
              { certification: "R", release_date: "1999-10-15T00:00:00.000Z", type: 3, note: "" },
              { certification: "", release_date: "2000-01-01T00:00:00.000Z", type: 5 },
            ],
          },
          { iso_3166_1: "FR", release_dates: [] },
        ],
      },
      [550],
    );

    expect(rows).toEqual([
      {
        id: 550,
        release_dates: [
          { iso_3166_1: "US", release_date: "1999-10-15T00:00:00.000Z", type: 3, certification: "R" },
          { iso_3166_1: "US", release_date: "2000-01-01T00:00:00.000Z", type: 5, certification: "" },
        ],
      },
    ]);
  });

  it("lifts translated texts out of data", () => {
    expect(
      projectMovieTranslations(
        {
          translations: [
            { iso_639_1: "fr", iso_3166_1: "FR", data: { title: "Titre", overview: "Résumé", tagline: "" } },
          ],
        },
        [550],
      ),
    ).toEqual([
      {
        id: 550,
        translations: [
          { iso_639_1: "fr", iso_3166_1: "FR", title: "Titre", overview: "Résumé", tagline: "" },
        ],
      },
    ]);
  });

  it("uses the requested id when the payload has none", () => {
    expect(projectMovieDetails({}, [42])[0]?.id).toBe(42);
  });
});

describe("tv projections", () => {
  it("builds the seasons index from complete entries only", () => {
    const [row] = projectSeriesDetails(
      {
        id: 1399,
        status: "Ended",
        languages: "en",
        seasons: [
          { season_number: 0, id: 3627, name: "Specials" },
          { season_number: 1, id: 3624 },
          { season_number: 2 },
          { season_number: "3", id: 3626 },
        ],
      },
      [1399],
    );

    expect(row?.seasons_index).toEqual([
      { season_number: 0, id: 3627 },
      { season_number: 1, id: 3624 },
    ]);
    expect(row?.languages).toEqual([]);
    expect(row?.status).toBe("Ended");
  });

  it("counts a season's episodes from the episode list", () => {
    expect(
      projectSeason(
        { id: 3624, air_date: "2011-04-17", episodes: [{}, {}, {}], episode_count: 10 },
        [1399, 1],
      ),
    ).toEqual([
      {
        season_id: 3624,
        series_id: 1399,
        season_number: 1,
        name: null,
        overview: null,
        air_date: "2011-04-17",
        vote_average: null,
        episode_count: 3,
        _id: null,
      },
    ]);
    expect(projectSeason({ episode_count: 10 }, [1399, 1])[0]?.episode_count).toBe(10);
  });

  it("keys episodes by the requested triple", () => {
    const [row] = projectEpisode(
      { id: 63056, name: "Pilot", crew: [{ job: "Director", id: 1, name: "A", profile_path: null }] },
      [1399, 1, 1],
    );
    expect(row).toMatchObject({ episode_id: 63056, series_id: 1399, season_number: 1, episode_number: 1 });
    expect(row?.crew).toEqual([
      { job: "Director", department: null, credit_id: null, id: 1, name: "A", original_name: null, gender: null },
    ]);
  });
});

describe("reference projections", () => {
  it("keeps configuration rows whose fields are all strings", () => {
    expect(
      projectLanguages([
        { iso_639_1: "fr", english_name: "French", name: "Français" },
        { iso_639_1: "xx", english_name: "No Language", name: null },
      ]),
    ).toEqual([{ iso_639_1: "fr", english_name: "French", name: "Français" }]);
    expect(projectCountries({ not: "a list" })).toEqual([]);
  });

  it("lists one certification row per country and rating", () => {
    expect(
      projectCertifications({
        certifications: {
          FR: [{ certification: "U", meaning: "Tous publics", order: 1 }],
          US: [
            { certification: "G", meaning: "General", order: 1 },
            { meaning: "no code", order: 2 },
          ],
        },
      }),
    ).toEqual([
      { country_code: "FR", certification: "U", meaning: "Tous publics", order: 1 },
      { country_code: "US", certification: "G", meaning: "General", order: 1 },
    ]);
  });

  it("tags genres with the requested language", () => {
    expect(
      projectGenres({ genres: [{ id: 28, name: "Action" }, { id: "x", name: "Bad" }] }, ["fr"]),
    ).toEqual([{ iso_639_1: "fr", id: 28, name: "Action" }]);
  });
});

describe("catalog projections", () => {
  it("keeps a person's aliases as a list", () => {
    const [row] = projectPerson({ id: 287, name: "Test Person", also_known_as: null }, [287]);
    expect(row).toMatchObject({ id: 287, name: "Test Person", also_known_as: [], deathday: null });
  });

  it("reduces a company's parent to id and name", () => {
    const [row] = projectCompany(
      { id: 1, name: "Co", parent_company: { id: 2, name: "Parent", logo_path: "/p.png" } },
      [1],
    );
    expect(row?.parent_company).toEqual({ id: 2, name: "Parent" });
    expect(projectCompany({ id: 3 }, [3])[0]?.parent_company).toBeNull();
  });
});

describe("watch providers", () => {
  it("emits one row per country and provider across offer types", () => {
    const rows = watchProviderRows("id_movie")(
      {
        id: 550,
        results: {
          US: {
            link: "https://example.test",
            flatrate: [{ provider_id: 8, provider_name: "Stream" }],
            rent: [
              { provider_id: 8, provider_name: "Stream" },
              { provider_id: 2, provider_name: "Store" },
            ],
          },
          FR: { buy: [{ provider_id: 2, provider_name: "Store" }, { provider_id: "9" }] },
        },
      },
      [550],
    );

    expect(rows).toEqual([
      { id_movie: 550, provider_id: 8, provider_name: "Stream", country_code: "US" },
      { id_movie: 550, provider_id: 2, provider_name: "Store", country_code: "US" },
      { id_movie: 550, provider_id: 2, provider_name: "Store", country_code: "FR" },
    ]);
  });
});

describe("entity catalog", () => {
  it("has unique names and looks them up", () => {
    const names = ENTITIES.map((entity) => entity.name);
    expect(new Set(names).size).toBe(names.length);
    expect(getEntity("movie_details")?.endpoint([550])).toBe("/movie/550");
    expect(getEntity("tv_episodes_details")?.endpoint([1399, 1, 2])).toBe(
      "/tv/1399/season/1/episode/2",
    );
    expect(getEntity("ref_genre_movies")?.params?.(["fr"])).toEqual({ language: "fr" });
    expect(getEntity("nope")).toBeUndefined();
  });

  it("orders every store before the entities that read it", () => {
    const position = new Map(ENTITIES.map((entity, index) => [`${entity.name}.ndjson`, index]));
    ENTITIES.forEach((entity, index) => {
      if (entity.candidates.kind !== "store") return;
      const producer = position.get(entity.candidates.file);
      if (producer !== undefined) expect(producer).toBeLessThan(index);
    });
  });
});
