// lib/systems/ContradictionSystem.ts
// Contradiction lifecycle: LATENT -> ACTIVE -> CRITICAL -> {RESOLVED, RUPTURED}.
// States only move forward. Resolution comes from queued commands and reseeds fresh contradictions.

import { ContradictionKind, ContradictionState, ResolutionKind } from '../../enums';
import type { Contradiction, ResolveContradictionCommand, WorldState } from '../../types';
import type { SimulationConfig } from '../config/schema';
import { InvariantViolation } from '../diagnostics/errors';
import { diagnosticEvent } from '../diagnostics/report';
import type { EventDraft } from '../events/types';
import { metabolicPressure, nextIntensity, wealthGap } from '../formulas/tension';
import { cloneWorld, sortedIds } from '../model/world';
import { clamp01 } from '../util/math';
import type { SimSystem } from './types';

const STATE_RANK: Record<ContradictionState, number> = {
  [ContradictionState.Latent]: 0,
  [ContradictionState.Active]: 1,
  [ContradictionState.Critical]: 2,
  [ContradictionState.Resolved]: 3,
  [ContradictionState.Ruptured]: 3,
};

export function stateRank(s: ContradictionState): number {
  return STATE_RANK[s];
}

export function isTerminal(s: ContradictionState): boolean {
  return s === ContradictionState.Resolved || s === ContradictionState.Ruptured;
}

/** Side effects of a resolution on the antithesis class, when it is a class. */
const RESOLUTION_EFFECTS: Record<ResolutionKind, { agitation: number; organization: number; repression: number }> = {
  [ResolutionKind.Reform]: { agitation: 0.5, organization: 1, repression: 0 },
  [ResolutionKind.Suppression]: { agitation: 1, organization: 0.5, repression: 0.1 },
  [ResolutionKind.Revolution]: { agitation: 0.5, organization: 1.1, repression: -0.1 },
};

function measurePressure(w: WorldState, k: Contradiction): number {
  if (k.kind === ContradictionKind.Metabolic) return metabolicPressure(w.aggregates.overshootRatio);
  const thesis = w.entities[k.thesisId];
  const antithesis = w.entities[k.antithesisId];
  if (!thesis || !antithesis) return 0;
  return wealthGap(thesis.wealth, antithesis.wealth);
}

function reseedIds(w: WorldState, k: Contradiction, count: number): string[] {
  const root = k.id.split('#')[0];
  const generation = k.generation + 1;
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    let id = count === 1 ? `${root}#g${generation}` : `${root}#g${generation}.${i}`;
    while (w.contradictions[id] || ids.includes(id)) id = `${id}'`;
    ids.push(id);
  }
  return ids;
}

function resolve(
  w: WorldState,
  k: Contradiction,
  cmd: ResolveContradictionCommand,
  cfg: SimulationConfig['contradiction'],
  events: EventDraft[],
): string[] {
  const from = k.state;
  k.state = ContradictionState.Resolved;
  k.ticksAboveCeiling = 0;

  const antithesis = w.entities[k.antithesisId];
  if (antithesis) {
    const fx = RESOLUTION_EFFECTS[cmd.resolution];
    antithesis.ideology.agitation = clamp01(antithesis.ideology.agitation * fx.agitation);
    antithesis.organization = clamp01(antithesis.organization * fx.organization);
    antithesis.repressionFaced = clamp01(antithesis.repressionFaced + fx.repression);
  }

  const fresh = reseedIds(w, k, cfg.reseedCount);
  for (const id of fresh) {
    w.contradictions[id] = {
      id,
      name: k.name,
      kind: k.kind,
      thesisId: k.thesisId,
      antithesisId: k.antithesisId,
      intensity: cfg.reseedIntensity,
      state: ContradictionState.Latent,
      ticksAboveCeiling: 0,
      generation: k.generation + 1,
      parentId: k.id,
    };
  }

  events.push({
    kind: 'contradiction_transition',
    payload: { contradictionId: k.id, kind: k.kind, from, to: ContradictionState.Resolved, intensity: k.intensity },
  });
  events.push({ kind: 'contradiction_resolved', payload: { contradictionId: k.id, resolution: cmd.resolution, reseeded: [...fresh] } });
  return fresh;
}

function advance(k: Contradiction, cfg: SimulationConfig['contradiction'], events: EventDraft[]): void {
  const move = (to: ContradictionState) => {
    events.push({
      kind: 'contradiction_transition',
      payload: { contradictionId: k.id, kind: k.kind, from: k.state, to, intensity: k.intensity },
    });
    k.state = to;
  };

  if (k.state === ContradictionState.Latent && k.intensity >= cfg.activeThreshold) move(ContradictionState.Active);
  if (k.state === ContradictionState.Active && k.intensity >= cfg.criticalThreshold) move(ContradictionState.Critical);
  if (k.state !== ContradictionState.Critical) return;

  k.ticksAboveCeiling = k.intensity > cfg.ruptureCeiling ? k.ticksAboveCeiling + 1 : 0;
  if (k.ticksAboveCeiling >= cfg.ruptureWindow) {
    move(ContradictionState.Ruptured);
    events.push({
      kind: 'contradiction_rupture',
      payload: { contradictionId: k.id, kind: k.kind, intensity: k.intensity, ticksAboveCeiling: k.ticksAboveCeiling },
    });
  }
}

export const ContradictionSystem: SimSystem = {
  name: 'contradiction',
  run(state, ctx) {
    const cfg = ctx.config.contradiction;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];
    const fresh = new Set<string>();

    // queued resolutions first; every queued command is consumed here
    for (const cmd of w.commands) {
      const k = w.contradictions[cmd.contradictionId];
      if (!k) {
        events.push(diagnosticEvent('contradiction', new InvariantViolation(`command ${cmd.id} targets unknown contradiction ${cmd.contradictionId}`, cmd.id)));
        continue;
      }
      if (isTerminal(k.state)) {
        events.push(diagnosticEvent('contradiction', new InvariantViolation(`command ${cmd.id} cannot resolve ${k.id} from ${k.state}`, k.id)));
        continue;
      }
      events.push({
        kind: 'command_applied',
        payload: { commandId: cmd.id, issuedBy: cmd.issuedBy, contradictionId: k.id, resolution: cmd.resolution },
      });
      for (const id of resolve(w, k, cmd, cfg, events)) fresh.add(id);
    }
    w.commands = [];

    for (const id of sortedIds(w.contradictions)) {
      const k = w.contradictions[id];
      if (isTerminal(k.state) || fresh.has(id)) continue;
      k.intensity = nextIntensity(k.intensity, measurePressure(w, k), cfg.tensionRate);
      advance(k, cfg, events);
    }

    const open = Object.values(w.contradictions).filter(k => !isTerminal(k.state));
    w.aggregates.globalTension = open.length ? open.reduce((s, k) => s + k.intensity, 0) / open.length : 0;

    return { state: w, events };
  },
};
