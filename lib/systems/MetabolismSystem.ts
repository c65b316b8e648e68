// lib/systems/MetabolismSystem.ts
// Biocapacity regeneration and depletion; global overshoot ratio.

import type { EventDraft } from '../events/types';
import { biocapacityDelta, overshootRatio } from '../formulas/metabolism';
import { cloneWorld, sortedIds } from '../model/world';
import { clamp } from '../util/math';
import type { SimSystem } from './types';

export const MetabolismSystem: SimSystem = {
  name: 'metabolism',
  run(state, ctx) {
    const cfg = ctx.config.metabolism;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];
    const territoryIds = sortedIds(w.territories);

    // a world without territories has no metabolic base to overshoot
    if (territoryIds.length === 0) {
      w.aggregates.consumption = 0;
      w.aggregates.overshootRatio = 0;
      return { state: w, events };
    }

    let biocapacity = 0;
    for (const id of territoryIds) {
      const t = w.territories[id];
      const delta = biocapacityDelta(t.regenerationRate, t.maxBiocapacity, t.biocapacity, t.extractionIntensity, cfg.entropyFactor);
      t.biocapacity = clamp(t.biocapacity + delta, 0, t.maxBiocapacity);
      biocapacity += t.biocapacity;
    }

    let consumption = 0;
    for (const id of sortedIds(w.entities)) consumption += w.entities[id].population * cfg.consumptionPerCapita;

    const ratio = overshootRatio(consumption, biocapacity);
    const before = state.aggregates.overshootRatio;
    w.aggregates.consumption = consumption;
    w.aggregates.overshootRatio = ratio;
    if (ratio > cfg.overshootAlertThreshold && before <= cfg.overshootAlertThreshold) {
      events.push({ kind: 'ecological_overshoot', payload: { overshootRatio: ratio, consumption, biocapacity } });
    }

    return { state: w, events };
  },
};
