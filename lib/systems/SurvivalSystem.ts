// lib/systems/SurvivalSystem.ts
// Acquiescence vs. revolt for every class, with losses since the last tick weighed by loss aversion.

import type { EventDraft } from '../events/types';
import { acquiescenceProbability, perceivedWealth, revolutionProbability } from '../formulas/survival';
import { cloneWorld, sortedIds } from '../model/world';
import type { SimSystem } from './types';

export const SurvivalSystem: SimSystem = {
  name: 'survival',
  run(state, ctx) {
    const cfg = ctx.config.survival;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];

    for (const id of sortedIds(w.entities)) {
      const e = w.entities[id];
      const baseline = ctx.baseline.entities[id]?.wealth ?? e.wealth;
      const perceived = perceivedWealth(baseline, e.wealth, cfg.lossAversion);
      const pAcquiescence = acquiescenceProbability(perceived, e.subsistenceThreshold, cfg.steepness);
      const pRevolution = revolutionProbability(e.organization, e.repressionFaced);

      const crossed = e.pRevolution <= e.pAcquiescence && pRevolution > pAcquiescence;
      e.pAcquiescence = pAcquiescence;
      e.pRevolution = pRevolution;
      if (crossed) events.push({ kind: 'survival_crossover', payload: { entityId: id, pAcquiescence, pRevolution } });
    }

    return { state: w, events };
  },
};
