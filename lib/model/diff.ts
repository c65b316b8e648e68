// lib/model/diff.ts
// Which nodes and edges changed between two snapshots.

import type { WorldState } from '../../types';

export interface CollectionDiff {
  added: string[];
  removed: string[];
  changed: string[];
}

export interface WorldDiff {
  entities: CollectionDiff;
  territories: CollectionDiff;
  relationships: CollectionDiff;
  contradictions: CollectionDiff;
}

function diffCollection<T>(prev: Readonly<Record<string, T>>, next: Readonly<Record<string, T>>): CollectionDiff {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];
  for (const id of Object.keys(next).sort()) {
    if (!Object.prototype.hasOwnProperty.call(prev, id)) {
      added.push(id);
      continue;
    }
    if (JSON.stringify(prev[id]) !== JSON.stringify(next[id])) changed.push(id);
  }
  for (const id of Object.keys(prev).sort()) {
    if (!Object.prototype.hasOwnProperty.call(next, id)) removed.push(id);
  }
  return { added, removed, changed };
}

export function diffWorlds(prev: WorldState, next: WorldState): WorldDiff {
  return {
    entities: diffCollection(prev.entities, next.entities),
    territories: diffCollection(prev.territories, next.territories),
    relationships: diffCollection(prev.relationships, next.relationships),
    contradictions: diffCollection(prev.contradictions, next.contradictions),
  };
}
