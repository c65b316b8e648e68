// lib/model/invariants.ts
// Post-system repair pass: every bounded field back into its interval, every dangling edge dropped.

import type { WorldState } from '../../types';
import { InvariantViolation } from '../diagnostics/errors';
import type { SimulationError } from '../diagnostics/errors';
import { clampReported } from '../diagnostics/report';
import { nodeExists } from './world';

const UNBOUNDED = Number.MAX_VALUE;

/** Mutates the draft in place and returns what had to be repaired. */
export function enforceInvariants(draft: WorldState): SimulationError[] {
  const errors: SimulationError[] = [];
  const c = (field: string, v: number, min: number, max: number) => clampReported(field, v, min, max, errors);

  for (const id of Object.keys(draft.relationships).sort()) {
    const r = draft.relationships[id];
    if (!nodeExists(draft, r.sourceId) || !nodeExists(draft, r.targetId)) {
      delete draft.relationships[id];
      errors.push(new InvariantViolation(`relationship ${id} references a missing node (${r.sourceId} -> ${r.targetId})`, id));
      continue;
    }
    r.strength = c(`${id}.strength`, r.strength, 0, 1);
    r.flow = c(`${id}.flow`, r.flow, 0, UNBOUNDED);
  }

  for (const id of Object.keys(draft.entities).sort()) {
    const e = draft.entities[id];
    e.wealth = c(`${id}.wealth`, e.wealth, 0, UNBOUNDED);
    e.organization = c(`${id}.organization`, e.organization, 0, 1);
    e.repressionFaced = c(`${id}.repressionFaced`, e.repressionFaced, 0, 1);
    e.subsistenceThreshold = c(`${id}.subsistenceThreshold`, e.subsistenceThreshold, 0, UNBOUNDED);
    e.population = c(`${id}.population`, e.population, 0, UNBOUNDED);
    e.pAcquiescence = c(`${id}.pAcquiescence`, e.pAcquiescence, 0, 1);
    e.pRevolution = c(`${id}.pRevolution`, e.pRevolution, 0, 1);
    e.ideology.consciousness = c(`${id}.consciousness`, e.ideology.consciousness, -1, 1);
    e.ideology.agitation = c(`${id}.agitation`, e.ideology.agitation, 0, 1);
    if (e.territoryId !== null && !Object.prototype.hasOwnProperty.call(draft.territories, e.territoryId)) {
      errors.push(new InvariantViolation(`entity ${id} sits in missing territory ${e.territoryId}`, id));
      e.territoryId = null;
    }
  }

  for (const id of Object.keys(draft.territories).sort()) {
    const t = draft.territories[id];
    t.heat = c(`${id}.heat`, t.heat, 0, 1);
    t.population = c(`${id}.population`, t.population, 0, UNBOUNDED);
    t.rent = c(`${id}.rent`, t.rent, 0, UNBOUNDED);
    t.biocapacity = c(`${id}.biocapacity`, t.biocapacity, 0, t.maxBiocapacity);
    t.regenerationRate = c(`${id}.regenerationRate`, t.regenerationRate, 0, 1);
    t.extractionIntensity = c(`${id}.extractionIntensity`, t.extractionIntensity, 0, 1);
  }

  for (const id of Object.keys(draft.contradictions).sort()) {
    const k = draft.contradictions[id];
    if (!nodeExists(draft, k.thesisId) || !nodeExists(draft, k.antithesisId)) {
      delete draft.contradictions[id];
      errors.push(new InvariantViolation(`contradiction ${id} references a missing node`, id));
      continue;
    }
    k.intensity = c(`${id}.intensity`, k.intensity, 0, 1);
  }

  const a = draft.aggregates;
  a.imperialRentPool = c('aggregates.imperialRentPool', a.imperialRentPool, 0, UNBOUNDED);
  a.wageRate = c('aggregates.wageRate', a.wageRate, 0, 1);
  a.globalTension = c('aggregates.globalTension', a.globalTension, 0, 1);
  a.overshootRatio = c('aggregates.overshootRatio', a.overshootRatio, 0, UNBOUNDED);
  a.consumption = c('aggregates.consumption', a.consumption, 0, UNBOUNDED);

  return errors;
}
