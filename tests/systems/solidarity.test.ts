import { describe, expect, it } from 'vitest';

import { RelationshipKind, SectorType, SocialRole } from '@/enums';
import { DEFAULT_CONFIG } from '@/lib/config/load';
import { RandomStream } from '@/lib/core/noise';
import { runTick } from '@/lib/engine/tick';
import { createWorld, makeRelationship, makeSocialClass, makeTerritory } from '@/lib/model/world';
import { SolidaritySystem } from '@/lib/systems/SolidaritySystem';

import { pruneWorld } from '../support/fixtures';

const rng = new RandomStream('solidarity');

describe('SolidaritySystem', () => {
  it('prunes a 0.05 edge after one decay step at rate 0.05', () => {
    const { state, events } = runTick(pruneWorld(), DEFAULT_CONFIG, rng, { systems: [SolidaritySystem] });
    expect(state.relationships).toEqual({});
    const pruned = events.filter(e => e.kind === 'edge_pruned');
    expect(pruned).toHaveLength(1);
    const [event] = pruned;
    expect(event.kind === 'edge_pruned' && event.payload.relationshipId).toBe('solidarity:a->b');
    expect(event.kind === 'edge_pruned' && event.payload.strength).toBeCloseTo(0.0475, 12);
  });

  it('carries consciousness downhill and decays the edge', () => {
    const w = createWorld({
      entities: [
        makeSocialClass({ id: 'a', role: SocialRole.PeripheryProletariat, ideology: { consciousness: 0.8 } }),
        makeSocialClass({ id: 'b', role: SocialRole.PeripheryProletariat, ideology: { consciousness: 0.2 } }),
      ],
      relationships: [makeRelationship({ kind: RelationshipKind.Solidarity, sourceId: 'a', targetId: 'b', strength: 0.5 })],
    });
    const { state, events } = runTick(w, DEFAULT_CONFIG, rng, { systems: [SolidaritySystem] });
    expect(state.entities.b.ideology.consciousness).toBeCloseTo(0.5, 12);
    expect(state.entities.a.ideology.consciousness).toBe(0.8);
    expect(state.relationships['solidarity:a->b'].strength).toBeCloseTo(0.475, 12);
    expect(events.map(e => e.kind)).toEqual(['solidarity_transmission']);
  });

  it('forms an edge between conscious exploited classes sharing a territory', () => {
    const w = createWorld({
      territories: [makeTerritory({ id: 'district', sector: SectorType.Residential })],
      entities: [
        makeSocialClass({ id: 'a', role: SocialRole.PeripheryProletariat, territoryId: 'district', ideology: { consciousness: 0.6 } }),
        makeSocialClass({ id: 'b', role: SocialRole.InternalProletariat, territoryId: 'district', ideology: { consciousness: 0.7 } }),
        makeSocialClass({ id: 'c', role: SocialRole.CoreBourgeoisie, territoryId: 'district', ideology: { consciousness: 0.9 } }),
      ],
    });
    const { state, events } = runTick(w, DEFAULT_CONFIG, rng, { systems: [SolidaritySystem] });
    expect(Object.keys(state.relationships)).toEqual(['solidarity:b->a']);
    expect(state.relationships['solidarity:b->a'].strength).toBe(0.3);
    expect(events.map(e => e.kind)).toEqual(['edge_formed']);
  });
});
