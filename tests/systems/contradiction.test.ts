import { describe, expect, it } from 'vitest';

import { ContradictionKind, ContradictionState, ResolutionKind, SocialRole } from '@/enums';
import type { Contradiction, WorldState } from '@/types';
import { DEFAULT_CONFIG } from '@/lib/config/load';
import { RandomStream } from '@/lib/core/noise';
import { runTick } from '@/lib/engine/tick';
import { createWorld, makeSocialClass } from '@/lib/model/world';
import { ContradictionSystem, stateRank } from '@/lib/systems/ContradictionSystem';

const rng = new RandomStream('contradiction');

function contradiction(overrides: Partial<Contradiction>): Contradiction {
  return {
    id: 'k',
    name: 'Capital vs. labor',
    kind: ContradictionKind.CapitalLabor,
    thesisId: 'owners',
    antithesisId: 'workers',
    intensity: 0.29,
    state: ContradictionState.Latent,
    ticksAboveCeiling: 0,
    generation: 0,
    parentId: null,
    ...overrides,
  };
}

function world(k: Contradiction): WorldState {
  return createWorld({
    entities: [
      makeSocialClass({ id: 'owners', role: SocialRole.CoreBourgeoisie, wealth: 100 }),
      makeSocialClass({ id: 'workers', role: SocialRole.PeripheryProletariat, wealth: 0, ideology: { agitation: 0.8 }, organization: 0.5 }),
    ],
    contradictions: [k],
  });
}

function resolveCommand(contradictionId: string, resolution: ResolutionKind) {
  return {
    id: 'cmd:test',
    kind: 'resolve_contradiction' as const,
    issuedAt: 0,
    issuedBy: 'test',
    contradictionId,
    resolution,
  };
}

describe('ContradictionSystem', () => {
  it('only ever moves forward and ruptures after the window above the ceiling', () => {
    let w = world(contradiction({}));
    const states: ContradictionState[] = [];
    for (let i = 0; i < 25; i++) {
      w = runTick(w, DEFAULT_CONFIG, rng, { systems: [ContradictionSystem] }).state;
      states.push(w.contradictions.k.state);
    }
    for (let i = 1; i < states.length; i++) expect(stateRank(states[i])).toBeGreaterThanOrEqual(stateRank(states[i - 1]));
    expect(states.indexOf(ContradictionState.Active) + 1).toBe(1);
    expect(states.indexOf(ContradictionState.Critical) + 1).toBe(6);
    expect(states.indexOf(ContradictionState.Ruptured) + 1).toBe(21);
    expect(states[24]).toBe(ContradictionState.Ruptured);
  });

  it('freezes intensity once terminal', () => {
    let w = world(contradiction({ state: ContradictionState.Ruptured, intensity: 0.95 }));
    w = runTick(w, DEFAULT_CONFIG, rng, { systems: [ContradictionSystem] }).state;
    expect(w.contradictions.k.intensity).toBe(0.95);
    expect(w.aggregates.globalTension).toBe(0);
  });

  it('resolves on command and reseeds a fresh latent contradiction', () => {
    const w = world(contradiction({ state: ContradictionState.Critical, intensity: 0.7 }));
    const { state, events } = runTick(w, DEFAULT_CONFIG, rng, {
      systems: [ContradictionSystem],
      commands: [resolveCommand('k', ResolutionKind.Reform)],
    });

    expect(state.contradictions.k.state).toBe(ContradictionState.Resolved);
    expect(state.contradictions['k#g1']).toEqual({
      id: 'k#g1',
      name: 'Capital vs. labor',
      kind: ContradictionKind.CapitalLabor,
      thesisId: 'owners',
      antithesisId: 'workers',
      intensity: 0,
      state: ContradictionState.Latent,
      ticksAboveCeiling: 0,
      generation: 1,
      parentId: 'k',
    });
    expect(state.commands).toEqual([]);
    expect(state.entities.workers.ideology.agitation).toBeCloseTo(0.4, 12);
    expect(events.map(e => e.kind)).toEqual(['command_applied', 'contradiction_transition', 'contradiction_resolved']);
    expect(state.aggregates.globalTension).toBe(0);
  });

  it('hands out the reseeded ids frozen', () => {
    const w = world(contradiction({ state: ContradictionState.Critical, intensity: 0.7 }));
    const { events } = runTick(w, DEFAULT_CONFIG, rng, {
      systems: [ContradictionSystem],
      commands: [resolveCommand('k', ResolutionKind.Reform)],
    });
    const resolved = events.find(e => e.kind === 'contradiction_resolved');
    if (resolved?.kind !== 'contradiction_resolved') throw new Error('no contradiction_resolved event');

    expect(resolved.payload.reseeded).toEqual(['k#g1']);
    expect(Object.isFrozen(resolved.payload.reseeded)).toBe(true);
  });

  it('reports commands it cannot apply', () => {
    const w = world(contradiction({ state: ContradictionState.Resolved }));
    const { state, events } = runTick(w, DEFAULT_CONFIG, rng, {
      systems: [ContradictionSystem],
      commands: [resolveCommand('k', ResolutionKind.Revolution), resolveCommand('missing', ResolutionKind.Reform)],
    });
    expect(state.contradictions.k.state).toBe(ContradictionState.Resolved);
    expect(events.map(e => (e.kind === 'diagnostic' ? e.payload.code : e.kind))).toEqual([
      'INVARIANT_VIOLATION',
      'INVARIANT_VIOLATION',
    ]);
  });

  it('drives metabolic contradictions from overshoot', () => {
    const k = contradiction({ kind: ContradictionKind.Metabolic, intensity: 0 });
    const w = world(k);
    w.aggregates.overshootRatio = 1.5;
    const { state } = runTick(w, DEFAULT_CONFIG, rng, { systems: [ContradictionSystem] });
    expect(state.contradictions.k.intensity).toBeCloseTo(0.05, 12);
  });
});
