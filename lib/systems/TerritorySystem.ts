// lib/systems/TerritorySystem.ts
// State attention: heat gain/decay, spillover along adjacency, eviction and displacement.

import { RelationshipKind, TerritoryProfile } from '../../enums';
import type { TerritoryId } from '../../types';
import type { EventDraft } from '../events/types';
import { edgesOfKind } from '../model/graph';
import { cloneWorld, sortedIds } from '../model/world';
import { clamp01 } from '../util/math';
import type { SimSystem } from './types';

export const TerritorySystem: SimSystem = {
  name: 'territory',
  run(state, ctx) {
    const cfg = ctx.config.territory;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];
    const ids = sortedIds(w.territories);

    for (const id of ids) {
      const t = w.territories[id];
      t.heat = t.profile === TerritoryProfile.High ? clamp01(t.heat + cfg.highProfileHeatGain) : t.heat * (1 - cfg.lowProfileHeatDecay);
    }

    // spillover reads the post-decay heats of both ends
    const spill = new Map<TerritoryId, number>();
    for (const edge of edgesOfKind(w, RelationshipKind.Adjacency)) {
      const a = w.territories[edge.sourceId];
      const b = w.territories[edge.targetId];
      if (!a || !b) continue;
      spill.set(b.id, (spill.get(b.id) ?? 0) + a.heat * cfg.spilloverRate);
      spill.set(a.id, (spill.get(a.id) ?? 0) + b.heat * cfg.spilloverRate);
    }
    for (const id of ids) {
      const t = w.territories[id];
      t.heat = clamp01(t.heat + (spill.get(id) ?? 0));
    }

    for (const id of ids) {
      const t = w.territories[id];
      if (!t.evicting && t.heat >= cfg.evictionHeatThreshold) {
        t.evicting = true;
        t.rent *= cfg.rentSpikeMultiplier;
        events.push({ kind: 'eviction_started', payload: { territoryId: id, heat: t.heat, rent: t.rent } });
      } else if (t.evicting && t.heat < cfg.evictionReleaseThreshold) {
        t.evicting = false;
      }
      if (!t.evicting) continue;
      const displaced = t.population * cfg.displacementRate;
      if (displaced <= 0) continue;
      t.population -= displaced;
      events.push({ kind: 'displacement', payload: { territoryId: id, displaced, population: t.population } });
    }

    return { state: w, events };
  },
};
