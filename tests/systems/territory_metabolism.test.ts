import { describe, expect, it } from 'vitest';

import { RelationshipKind, SectorType, TerritoryProfile } from '@/enums';
import { DEFAULT_CONFIG } from '@/lib/config/load';
import { RandomStream } from '@/lib/core/noise';
import { runTick } from '@/lib/engine/tick';
import { createWorld, makeRelationship, makeTerritory } from '@/lib/model/world';
import { MetabolismSystem } from '@/lib/systems/MetabolismSystem';
import { TerritorySystem } from '@/lib/systems/TerritorySystem';

import { collapseWorld } from '../support/fixtures';

const rng = new RandomStream('territory');

describe('TerritorySystem', () => {
  it('starts an eviction once heat reaches the threshold and displaces population', () => {
    const w = createWorld({
      territories: [
        makeTerritory({ id: 'downtown', sector: SectorType.Commercial, profile: TerritoryProfile.High, heat: 0.7, rent: 10, population: 1000 }),
      ],
    });

    const { state, events } = runTick(w, DEFAULT_CONFIG, rng, { systems: [TerritorySystem] });

    const t = state.territories.downtown;
    expect(t.heat).toBeCloseTo(0.85, 12);
    expect(t.evicting).toBe(true);
    expect(t.rent).toBe(15);
    expect(t.population).toBe(900);
    expect(events.map(e => e.kind)).toEqual(['eviction_started', 'displacement']);
  });

  it('decays low-profile heat, spills it to neighbours and releases evictions', () => {
    const w = createWorld({
      territories: [
        makeTerritory({ id: 'a', sector: SectorType.Residential, heat: 0.5, evicting: true, population: 0 }),
        makeTerritory({ id: 'b', sector: SectorType.Residential, heat: 0 }),
      ],
      relationships: [makeRelationship({ kind: RelationshipKind.Adjacency, sourceId: 'a', targetId: 'b' })],
    });

    const { state, events } = runTick(w, DEFAULT_CONFIG, rng, { systems: [TerritorySystem] });

    expect(state.territories.a.heat).toBeCloseTo(0.45, 12);
    expect(state.territories.b.heat).toBeCloseTo(0.0225, 12);
    expect(state.territories.a.evicting).toBe(false);
    expect(events).toEqual([]);
  });
});

describe('MetabolismSystem', () => {
  it('reports zero overshoot without territories', () => {
    const w = createWorld({});
    w.aggregates.overshootRatio = 3;
    const { state } = runTick(w, DEFAULT_CONFIG, rng, { systems: [MetabolismSystem] });
    expect(state.aggregates.overshootRatio).toBe(0);
    expect(state.aggregates.consumption).toBe(0);
  });

  it('computes overshoot from consumption per capita and flags the crossing once', () => {
    const first = runTick(collapseWorld(), DEFAULT_CONFIG, rng, { systems: [MetabolismSystem] });
    expect(first.state.aggregates.consumption).toBe(250);
    expect(first.state.aggregates.overshootRatio).toBe(2.5);
    expect(first.events.map(e => e.kind)).toEqual(['ecological_overshoot']);

    const second = runTick(first.state, DEFAULT_CONFIG, rng, { systems: [MetabolismSystem] });
    expect(second.events).toEqual([]);
  });

  it('depletes biocapacity under extraction', () => {
    const w = createWorld({
      territories: [makeTerritory({ id: 'mine', sector: SectorType.Extractive, biocapacity: 50, extractionIntensity: 0.1 })],
    });
    const { state } = runTick(w, DEFAULT_CONFIG, rng, { systems: [MetabolismSystem] });
    expect(state.territories.mine.biocapacity).toBeCloseTo(46, 12);
  });
});
