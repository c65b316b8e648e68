// lib/model/world.ts
// Construction and copying of world snapshots.

import { Attractor, RelationshipKind, SocialRole, TerritoryProfile } from '../../enums';
import type {
  Contradiction,
  Relationship,
  SocialClass,
  Territory,
  WorldAggregates,
  WorldState,
} from '../../types';
import { deepFreeze } from '../util/freeze';

export const EXPLOITED_ROLES: ReadonlySet<SocialRole> = new Set([
  SocialRole.PeripheryProletariat,
  SocialRole.InternalProletariat,
  SocialRole.Lumpenproletariat,
]);

export const VALUE_FLOW_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.Extraction,
  RelationshipKind.Tribute,
  RelationshipKind.Wages,
  RelationshipKind.ClientState,
]);

export function cloneWorld(w: WorldState): WorldState {
  return structuredClone(w);
}

export function freezeWorld(w: WorldState): WorldState {
  return deepFreeze(w);
}

export type SocialClassInit = Pick<SocialClass, 'id' | 'role'> & Partial<Omit<SocialClass, 'id' | 'role' | 'ideology'>> & {
  ideology?: Partial<SocialClass['ideology']>;
};

export function makeSocialClass(init: SocialClassInit): SocialClass {
  return {
    id: init.id,
    name: init.name ?? init.id,
    role: init.role,
    wealth: init.wealth ?? 0,
    organization: init.organization ?? 0.1,
    repressionFaced: init.repressionFaced ?? 0,
    subsistenceThreshold: init.subsistenceThreshold ?? 0.3,
    population: init.population ?? 1,
    ideology: {
      consciousness: init.ideology?.consciousness ?? 0,
      agitation: init.ideology?.agitation ?? 0,
      attractor: init.ideology?.attractor ?? Attractor.None,
      routedTicks: init.ideology?.routedTicks ?? 0,
    },
    pAcquiescence: init.pAcquiescence ?? 0,
    pRevolution: init.pRevolution ?? 0,
    territoryId: init.territoryId ?? null,
  };
}

export type TerritoryInit = Pick<Territory, 'id' | 'sector'> & Partial<Omit<Territory, 'id' | 'sector'>>;

export function makeTerritory(init: TerritoryInit): Territory {
  const maxBiocapacity = init.maxBiocapacity ?? 100;
  return {
    id: init.id,
    name: init.name ?? init.id,
    sector: init.sector,
    profile: init.profile ?? TerritoryProfile.Low,
    heat: init.heat ?? 0,
    population: init.population ?? 0,
    rent: init.rent ?? 0,
    evicting: init.evicting ?? false,
    biocapacity: init.biocapacity ?? maxBiocapacity,
    maxBiocapacity,
    regenerationRate: init.regenerationRate ?? 0.02,
    extractionIntensity: init.extractionIntensity ?? 0,
  };
}

export type RelationshipInit = Pick<Relationship, 'kind' | 'sourceId' | 'targetId'> & Partial<Pick<Relationship, 'id' | 'strength' | 'flow'>>;

export function relationshipId(kind: RelationshipKind, sourceId: string, targetId: string): string {
  return `${kind}:${sourceId}->${targetId}`;
}

export function makeRelationship(init: RelationshipInit): Relationship {
  return {
    id: init.id ?? relationshipId(init.kind, init.sourceId, init.targetId),
    kind: init.kind,
    sourceId: init.sourceId,
    targetId: init.targetId,
    strength: init.strength ?? 1,
    flow: init.flow ?? 0,
  };
}

export interface WorldInit {
  tick?: number;
  entities?: SocialClass[];
  territories?: Territory[];
  relationships?: Relationship[];
  contradictions?: Contradiction[];
  aggregates?: Partial<WorldAggregates>;
}

/** Build a world from lists. Duplicate ids throw; reference checks live in hydrate/invariants. */
export function createWorld(init: WorldInit): WorldState {
  const byId = <T extends { id: string }>(label: string, items: readonly T[]): Record<string, T> => {
    const out: Record<string, T> = {};
    for (const item of items) {
      if (Object.prototype.hasOwnProperty.call(out, item.id)) {
        throw new Error(`[world] duplicate ${label} id "${item.id}"`);
      }
      out[item.id] = item;
    }
    return out;
  };
  return {
    tick: init.tick ?? 0,
    entities: byId('entity', init.entities ?? []),
    territories: byId('territory', init.territories ?? []),
    relationships: byId('relationship', init.relationships ?? []),
    contradictions: byId('contradiction', init.contradictions ?? []),
    aggregates: {
      imperialRentPool: init.aggregates?.imperialRentPool ?? 100,
      wageRate: init.aggregates?.wageRate ?? 0.2,
      globalTension: init.aggregates?.globalTension ?? 0,
      overshootRatio: init.aggregates?.overshootRatio ?? 0,
      consumption: init.aggregates?.consumption ?? 0,
    },
    commands: [],
    terminal: null,
    templateTriggers: {},
  };
}

/** Ids in sorted order; every system iterates through these for reproducible output. */
export function sortedIds(map: Readonly<Record<string, unknown>>): string[] {
  return Object.keys(map).sort();
}

export function nodeExists(w: WorldState, id: string): boolean {
  return Object.prototype.hasOwnProperty.call(w.entities, id) || Object.prototype.hasOwnProperty.call(w.territories, id);
}
