// lib/systems/DecompositionSystem.ts
// Labor aristocracy splits into enforcers and internal proletariat once super-wages collapse;
// the guard/prisoner ratio then forces the terminal decision.

import { RelationshipKind, SocialRole } from '../../enums';
import type { SocialClass, TerminalDecision, WorldState } from '../../types';
import type { SimulationConfig } from '../config/schema';
import type { EventDraft } from '../events/types';
import { cloneWorld, makeRelationship, relationshipId, sortedIds } from '../model/world';
import { weightedMean } from '../util/math';
import type { SimSystem } from './types';

function fragment(source: SocialClass, id: string, role: SocialRole, share: number): SocialClass {
  return {
    ...structuredClone(source),
    id,
    name: `${source.name} (${role})`,
    role,
    wealth: source.wealth * share,
    population: source.population * share,
  };
}

function decompose(w: WorldState, cls: SocialClass, cfg: SimulationConfig['decomposition'], events: EventDraft[]): void {
  const enforcer = fragment(cls, `${cls.id}:enforcer`, SocialRole.CarceralEnforcer, cfg.enforcerFraction);
  const proletariat = fragment(cls, `${cls.id}:proletariat`, SocialRole.InternalProletariat, 1 - cfg.enforcerFraction);

  delete w.entities[cls.id];
  w.entities[enforcer.id] = enforcer;
  w.entities[proletariat.id] = proletariat;

  for (const id of sortedIds(w.relationships)) {
    const r = w.relationships[id];
    if (r.sourceId === cls.id || r.targetId === cls.id) delete w.relationships[id];
  }
  for (const id of sortedIds(w.contradictions)) {
    const k = w.contradictions[id];
    if (k.thesisId === cls.id) k.thesisId = proletariat.id;
    if (k.antithesisId === cls.id) k.antithesisId = proletariat.id;
  }

  const edgeId = relationshipId(RelationshipKind.Repression, enforcer.id, proletariat.id);
  w.relationships[edgeId] = makeRelationship({
    id: edgeId,
    kind: RelationshipKind.Repression,
    sourceId: enforcer.id,
    targetId: proletariat.id,
    strength: 0.5,
  });

  events.push({
    kind: 'class_decomposition',
    payload: { entityId: cls.id, enforcerId: enforcer.id, proletariatId: proletariat.id, wageRate: w.aggregates.wageRate },
  });
}

function controlRatio(w: WorldState, tick: number, cfg: SimulationConfig['decomposition'], events: EventDraft[]): void {
  if (w.terminal !== null) return;
  const all = sortedIds(w.entities).map(id => w.entities[id]);
  const guards = all.filter(e => e.role === SocialRole.CarceralEnforcer);
  const prisoners = all.filter(e => e.role === SocialRole.InternalProletariat);
  const guardCount = guards.reduce((s, e) => s + e.population, 0);
  const prisonerCount = prisoners.reduce((s, e) => s + e.population, 0);
  const capacity = guardCount * cfg.prisonersPerGuard;
  if (guardCount <= 0 || prisonerCount <= capacity) return;

  const organization = weightedMean(
    prisoners.map(e => e.organization),
    prisoners.map(e => e.population),
  );
  const decision: TerminalDecision = organization >= cfg.revolutionOrganizationThreshold ? 'revolution' : 'genocide';
  w.terminal = { tick, decision, prisonerOrganization: organization };
  events.push({ kind: 'control_ratio_crisis', payload: { guards: guardCount, prisoners: prisonerCount, capacity } });
  events.push({ kind: 'terminal_decision', payload: { decision, prisonerOrganization: organization } });
}

export const DecompositionSystem: SimSystem = {
  name: 'decomposition',
  run(state, ctx) {
    const cfg = ctx.config.decomposition;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];

    if (w.aggregates.wageRate <= cfg.crisisWageRate) {
      for (const id of sortedIds(w.entities)) {
        const cls = w.entities[id];
        if (cls && cls.role === SocialRole.LaborAristocracy) decompose(w, cls, cfg, events);
      }
    }
    controlRatio(w, ctx.tick, cfg, events);

    return { state: w, events };
  },
};
