// lib/model/graph.ts
// Adjacency views over the relationship arena. Edges are looked up by id, never by reference.

import type { RelationshipKind } from '../../enums';
import type { NodeId, Relationship, WorldState } from '../../types';

export interface Adjacency {
  out: Map<NodeId, Relationship[]>;
  in: Map<NodeId, Relationship[]>;
}

/** Index built once per system run; edges inside each bucket keep id order. */
export function buildAdjacency(w: WorldState, kind?: RelationshipKind): Adjacency {
  const out = new Map<NodeId, Relationship[]>();
  const inn = new Map<NodeId, Relationship[]>();
  for (const id of Object.keys(w.relationships).sort()) {
    const r = w.relationships[id];
    if (kind !== undefined && r.kind !== kind) continue;
    push(out, r.sourceId, r);
    push(inn, r.targetId, r);
  }
  return { out, in: inn };
}

function push(map: Map<NodeId, Relationship[]>, key: NodeId, r: Relationship): void {
  const list = map.get(key);
  if (list) list.push(r);
  else map.set(key, [r]);
}

export function edgesOfKind(w: WorldState, kind: RelationshipKind): Relationship[] {
  return Object.keys(w.relationships)
    .sort()
    .map(id => w.relationships[id])
    .filter(r => r.kind === kind);
}

export function outEdges(adj: Adjacency, id: NodeId): readonly Relationship[] {
  return adj.out.get(id) ?? [];
}

export function inEdges(adj: Adjacency, id: NodeId): readonly Relationship[] {
  return adj.in.get(id) ?? [];
}

/** Both directions, for symmetric kinds (adjacency, solidarity as a bond). */
export function incidentEdges(adj: Adjacency, id: NodeId): Relationship[] {
  return [...outEdges(adj, id), ...inEdges(adj, id)];
}

export function hasEdgeBetween(adj: Adjacency, a: NodeId, b: NodeId): boolean {
  return outEdges(adj, a).some(r => r.targetId === b) || outEdges(adj, b).some(r => r.targetId === a);
}
