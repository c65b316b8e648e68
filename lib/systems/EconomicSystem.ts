// lib/systems/EconomicSystem.ts
// Imperial circuit: extraction -> tribute -> wages -> client-state subsidy, then the policy response.

import { ContradictionKind, ContradictionState, PolicyDecision, RelationshipKind, ResolutionKind } from '../../enums';
import type { SocialClass, WorldState } from '../../types';
import type { SimulationConfig } from '../config/schema';
import type { SimulationError } from '../diagnostics/errors';
import { clampReported, diagnosticEvent } from '../diagnostics/report';
import type { EventDraft } from '../events/types';
import { imperialRent, proportionalPayment } from '../formulas/economic';
import { acquiescenceProbability, revolutionProbability } from '../formulas/survival';
import { bourgeoisieDecision } from '../formulas/tension';
import { edgesOfKind } from '../model/graph';
import { cloneWorld, EXPLOITED_ROLES, sortedIds, VALUE_FLOW_KINDS } from '../model/world';
import { clamp } from '../util/math';
import type { SimSystem } from './types';

/** Flows below this are bookkeeping noise and do not produce events. */
const EVENT_FLOOR = 0.01;

type Phase = (w: WorldState, cfg: SimulationConfig, events: EventDraft[], errors: SimulationError[]) => void;

function endpoints(w: WorldState, sourceId: string, targetId: string): [SocialClass, SocialClass] | null {
  const source = w.entities[sourceId];
  const target = w.entities[targetId];
  return source && target ? [source, target] : null;
}

const extractionPhase: Phase = (w, cfg, events, errors) => {
  for (const edge of edgesOfKind(w, RelationshipKind.Extraction)) {
    const pair = endpoints(w, edge.sourceId, edge.targetId);
    if (!pair) continue;
    const [worker, extractor] = pair;
    const wealth = clampReported(`${worker.id}.wealth`, worker.wealth, 0, Number.MAX_VALUE, errors);
    const rent = Math.min(imperialRent(cfg.economy.extractionEfficiency, wealth, worker.ideology.consciousness), wealth);
    worker.wealth = wealth - rent;
    extractor.wealth += rent;
    edge.flow = rent;
    if (rent > EVENT_FLOOR) {
      events.push({
        kind: 'surplus_extraction',
        payload: { sourceId: worker.id, targetId: extractor.id, amount: rent, mechanism: 'imperial_rent' },
      });
    }
  }
};

const tributePhase: Phase = (w, cfg, events) => {
  for (const edge of edgesOfKind(w, RelationshipKind.Tribute)) {
    const pair = endpoints(w, edge.sourceId, edge.targetId);
    if (!pair) continue;
    const [comprador, core] = pair;
    if (comprador.wealth <= 0) continue;
    const cut = comprador.wealth * cfg.economy.compradorCut;
    const tribute = comprador.wealth - cut;
    comprador.wealth = cut;
    core.wealth += tribute;
    w.aggregates.imperialRentPool += tribute;
    edge.flow = tribute;
    if (tribute > EVENT_FLOOR) {
      events.push({
        kind: 'surplus_extraction',
        payload: { sourceId: comprador.id, targetId: core.id, amount: tribute, mechanism: 'tribute' },
      });
    }
  }
};

const wagesPhase: Phase = (w, _cfg, events) => {
  for (const edge of edgesOfKind(w, RelationshipKind.Wages)) {
    const pair = endpoints(w, edge.sourceId, edge.targetId);
    if (!pair) continue;
    const [payer, aristocracy] = pair;
    const wages = proportionalPayment(payer.wealth, w.aggregates.wageRate);
    if (wages <= 0) continue;
    payer.wealth -= wages;
    aristocracy.wealth += wages;
    w.aggregates.imperialRentPool = Math.max(0, w.aggregates.imperialRentPool - wages);
    edge.flow = wages;
    if (wages > EVENT_FLOOR) {
      events.push({
        kind: 'surplus_extraction',
        payload: { sourceId: payer.id, targetId: aristocracy.id, amount: wages, mechanism: 'wages' },
      });
    }
  }
};

/** Unstable client states are propped up; the subsidy turns into repression, not wealth. */
const subsidyPhase: Phase = (w, cfg, events) => {
  const e = cfg.economy;
  for (const edge of edgesOfKind(w, RelationshipKind.ClientState)) {
    const pair = endpoints(w, edge.sourceId, edge.targetId);
    if (!pair) continue;
    const [core, client] = pair;
    const pA = acquiescenceProbability(client.wealth, client.subsistenceThreshold, cfg.survival.steepness);
    const pR = revolutionProbability(client.organization, client.repressionFaced);
    const stabilityRatio = pA > 0 ? pR / pA : pR > 0 ? 1 : 0;
    if (stabilityRatio < e.subsidyTriggerThreshold) continue;
    const subsidy = Math.min(e.subsidyCap, Math.max(0, core.wealth) * e.subsidyConversionRate);
    if (subsidy <= EVENT_FLOOR) continue;
    core.wealth -= subsidy;
    w.aggregates.imperialRentPool = Math.max(0, w.aggregates.imperialRentPool - subsidy);
    const repressionBoost = subsidy * e.subsidyConversionRate;
    client.repressionFaced = Math.min(1, client.repressionFaced + repressionBoost);
    edge.flow = subsidy;
    events.push({
      kind: 'imperial_subsidy',
      payload: { sourceId: core.id, targetId: client.id, amount: subsidy, repressionBoost, stabilityRatio },
    });
  }
};

function policyPhase(w: WorldState, cfg: SimulationConfig, tick: number, events: EventDraft[]): void {
  const e = cfg.economy;
  const pool = w.aggregates.imperialRentPool;
  const poolRatio = pool / e.initialRentPool;
  const response = bourgeoisieDecision(
    poolRatio,
    w.aggregates.globalTension,
    {
      high: e.poolHighThreshold,
      low: e.poolLowThreshold,
      critical: e.poolCriticalThreshold,
      lowTension: e.lowTension,
      highTension: e.highTension,
    },
    e,
  );
  if (response.decision === PolicyDecision.NoChange) return;

  w.aggregates.wageRate = clamp(w.aggregates.wageRate + response.wageDelta, e.minWageRate, e.maxWageRate);
  if (response.repressionDelta > 0) {
    for (const id of sortedIds(w.entities)) {
      const c = w.entities[id];
      if (EXPLOITED_ROLES.has(c.role)) c.repressionFaced = Math.min(1, c.repressionFaced + response.repressionDelta);
    }
  }
  events.push({
    kind: 'policy_decision',
    payload: {
      decision: response.decision,
      poolRatio,
      wageRate: w.aggregates.wageRate,
      repressionDelta: response.repressionDelta,
    },
  });
  if (response.decision === PolicyDecision.Crisis) {
    events.push({ kind: 'economic_crisis', payload: { poolRatio, pool } });
  }
  if (response.decision === PolicyDecision.Bribery) {
    // concessions defuse the capital-labor contradictions that are already critical
    for (const id of sortedIds(w.contradictions)) {
      const k = w.contradictions[id];
      if (k.kind !== ContradictionKind.CapitalLabor || k.state !== ContradictionState.Critical) continue;
      if (w.commands.some(c => c.contradictionId === id)) continue;
      w.commands.push({
        id: `cmd:${tick}:economic:${id}`,
        kind: 'resolve_contradiction',
        issuedAt: tick,
        issuedBy: 'economic',
        contradictionId: id,
        resolution: ResolutionKind.Reform,
      });
    }
  }
}

export const EconomicSystem: SimSystem = {
  name: 'economic',
  run(state, ctx) {
    const w = cloneWorld(state);
    const events: EventDraft[] = [];
    const errors: SimulationError[] = [];

    for (const id of sortedIds(w.relationships)) {
      const r = w.relationships[id];
      if (VALUE_FLOW_KINDS.has(r.kind)) r.flow = 0;
    }

    for (const phase of [extractionPhase, tributePhase, wagesPhase, subsidyPhase]) {
      phase(w, ctx.config, events, errors);
    }
    policyPhase(w, ctx.config, ctx.tick, events);

    for (const err of errors) events.push(diagnosticEvent('economic', err));
    return { state: w, events };
  },
};
