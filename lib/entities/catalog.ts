/**
 * People, companies and networks: fetched once from their daily id exports
 * and never refreshed.
 */

import { intIdFrom } from "../candidates";
import type { JsonRecord } from "../ndjson";
import { listField, objectField, pick } from "../projection";
import type { EntityDescriptor, IdentityKey } from "../types";
import { idOf, keyFrom } from "./shared";

export function projectPerson(raw: unknown, key: IdentityKey): JsonRecord[] {
  return [
    {
      ...pick(raw, [
        "id",
        "name",
        "also_known_as",
        "biography",
        "birthday",
        "deathday",
        "place_of_birth",
        "popularity",
        "gender",
        "known_for_department",
      ]),
      id: idOf(key),
      also_known_as: listField(raw, "also_known_as"),
    },
  ];
}

export function projectCompany(raw: unknown, key: IdentityKey): JsonRecord[] {
  const parent = objectField(raw, "parent_company");
  return [
    {
      ...pick(raw, ["id", "name", "description", "origin_country", "headquarters"]),
      id: idOf(key),
      parent_company: parent ? pick(parent, ["id", "name"]) : null,
    },
  ];
}

export function projectNetwork(raw: unknown, key: IdentityKey): JsonRecord[] {
  return [{ ...pick(raw, ["headquarters", "id", "name", "origin_country"]), id: idOf(key) }];
}

function fetchOnce(
  name: string,
  dumpFile: string,
  resource: string,
  project: EntityDescriptor["project"],
): EntityDescriptor {
  return {
    name,
    candidates: { kind: "store", file: dumpFile, extract: intIdFrom("id") },
    refresh: { kind: "never" },
    endpoint: (key) => `/${resource}/${idOf(key)}`,
    keyOf: keyFrom("id"),
    project,
  };
}

export const catalogEntities: EntityDescriptor[] = [
  fetchOnce("people_details", "people_dumps.json", "person", projectPerson),
  fetchOnce("company_details", "production_companies_dumps.json", "company", projectCompany),
  fetchOnce("tv_networks_details", "tv_networks_dumps.json", "network", projectNetwork),
];
