/**
 * Helpers shared by the entity catalog modules.
 */

import { field, listField, objectField, selectList } from "../projection";
import { isPlainObject, type JsonRecord } from "../ndjson";
import type { IdentityKey, RefreshPolicy } from "../types";

/** Refresh window for detail children that follow their parent's date */
export const CHILD_WINDOW_DAYS = 30;

export function isInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

/**
 * keyOf for stored lines: every named field must be an integer or a
 * non-empty string, otherwise the line has no key.
 */
export function keyFrom(...fields: string[]) {
  return (record: JsonRecord): IdentityKey | null => {
    const key: Array<string | number> = [];
    for (const name of fields) {
      const value = record[name];
      if (isInt(value) || (typeof value === "string" && value !== "")) key.push(value);
      else return null;
    }
    return key;
  };
}

/** First key part, which is the TMDB id for every id-keyed entity. */
export function idOf(key: IdentityKey): string | number {
  const [id] = key;
  if (id === undefined) throw new RangeError("Identity key is empty");
  return id;
}

const OFFER_TYPES = ["flatrate", "buy", "rent", "ads", "free"] as const;

export const parentPolicy: RefreshPolicy = { kind: "parent", windowDays: CHILD_WINDOW_DAYS };

/**
 * Child of a detail record: `{ id, <listName>: [...] }` where the list comes
 * from `sourceField` of the payload, cut down to `keys`.
 * The id is the requested one, so the row stays keyed even if the payload
 * omits it.
 */
export function idWithList(listName: string, sourceField: string, keys: readonly string[]) {
  return (raw: unknown, key: IdentityKey): JsonRecord[] => [
    {
      id: idOf(key),
      [listName]: selectList(field(raw, sourceField), keys),
    },
  ];
}

/**
 * Translations list: language and country codes plus the translated texts,
 * which TMDB nests under `data`. Movies call the title "title", series "name".
 */
export function translationsOf(titleField: "title" | "name") {
  return (raw: unknown, key: IdentityKey): JsonRecord[] => {
    const translations = listField(raw, "translations")
      .filter(isPlainObject)
      .map((entry) => {
        const data = objectField(entry, "data");
        return {
          iso_639_1: field(entry, "iso_639_1"),
          iso_3166_1: field(entry, "iso_3166_1"),
          [titleField]: field(data, titleField),
          overview: field(data, "overview"),
          tagline: field(data, "tagline"),
        };
      });
    return [{ id: idOf(key), translations }];
  };
}

/** Watch-provider rows for one title: one per (country, provider), deduplicated across offer types. */
export function watchProviderRows(idField: string) {
  return (raw: unknown, key: IdentityKey): JsonRecord[] => {
    const results = field(raw, "results");
    if (!isPlainObject(results)) return [];

    const rows: JsonRecord[] = [];
    for (const [countryCode, offer] of Object.entries(results)) {
      const seen = new Set<number>();
      for (const type of OFFER_TYPES) {
        for (const provider of selectList(field(offer, type), ["provider_id", "provider_name"])) {
          const providerId = provider.provider_id;
          const providerName = provider.provider_name;
          if (!isInt(providerId) || typeof providerName !== "string") continue;
          if (seen.has(providerId)) continue;
          seen.add(providerId);
          rows.push({
            [idField]: idOf(key),
            provider_id: providerId,
            provider_name: providerName,
            country_code: countryCode,
          });
        }
      }
    }
    return rows;
  };
}
