import type { EntityDescriptor } from "../types";
import { catalogEntities } from "./catalog";
import { movieEntities } from "./movies";
import { referenceEntities } from "./reference";
import { episodeDetails, seasonDetails, seriesChildren, seriesDetails, seriesWatchProviders } from "./tv";

/**
 * Every entity in run order: a store is always written before the entities
 * that read their candidates from it.
 */
export const ENTITIES: readonly EntityDescriptor[] = [
  ...referenceEntities,
  ...movieEntities,
  seriesDetails,
  seasonDetails,
  episodeDetails,
  ...seriesChildren,
  seriesWatchProviders,
  ...catalogEntities,
];

const byName = new Map(ENTITIES.map((entity) => [entity.name, entity]));

export function getEntity(name: string): EntityDescriptor | undefined {
  return byName.get(name);
}

export function entityNames(): string[] {
  return ENTITIES.map((entity) => entity.name);
}
