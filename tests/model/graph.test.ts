import { describe, expect, it } from 'vitest';

import { RelationshipKind, SocialRole } from '@/enums';
import { buildAdjacency, edgesOfKind, hasEdgeBetween, inEdges, incidentEdges, outEdges } from '@/lib/model/graph';
import { createWorld, makeRelationship, makeSocialClass } from '@/lib/model/world';

function triangle() {
  return createWorld({
    entities: ['a', 'b', 'c'].map(id => makeSocialClass({ id, role: SocialRole.PeripheryProletariat })),
    relationships: [
      makeRelationship({ id: 'e3', kind: RelationshipKind.Extraction, sourceId: 'a', targetId: 'c' }),
      makeRelationship({ id: 'e2', kind: RelationshipKind.Solidarity, sourceId: 'c', targetId: 'a' }),
      makeRelationship({ id: 'e1', kind: RelationshipKind.Solidarity, sourceId: 'a', targetId: 'b' }),
    ],
  });
}

const ids = (edges: readonly { id: string }[]) => edges.map(e => e.id);

describe('adjacency', () => {
  it('indexes every kind in id order when no kind is given', () => {
    const adj = buildAdjacency(triangle());
    expect(ids(outEdges(adj, 'a'))).toEqual(['e1', 'e3']);
    expect(ids(inEdges(adj, 'c'))).toEqual(['e3']);
    expect(outEdges(adj, 'missing')).toEqual([]);
  });

  it('keeps only the requested kind', () => {
    const adj = buildAdjacency(triangle(), RelationshipKind.Solidarity);
    expect(ids(outEdges(adj, 'a'))).toEqual(['e1']);
    expect(ids(incidentEdges(adj, 'a'))).toEqual(['e1', 'e2']);
    expect(ids(incidentEdges(adj, 'b'))).toEqual(['e1']);
  });

  it('finds an edge in either direction', () => {
    const adj = buildAdjacency(triangle(), RelationshipKind.Solidarity);
    expect(hasEdgeBetween(adj, 'a', 'c')).toBe(true);
    expect(hasEdgeBetween(adj, 'b', 'c')).toBe(false);
  });

  it('lists the edges of one kind', () => {
    expect(ids(edgesOfKind(triangle(), RelationshipKind.Extraction))).toEqual(['e3']);
  });
});
