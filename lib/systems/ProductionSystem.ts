// lib/systems/ProductionSystem.ts
// Workers on a tenancy produce from their land; the total sets each territory's extraction intensity.

import { RelationshipKind, SocialRole } from '../../enums';
import type { TerritoryId } from '../../types';
import type { EventDraft } from '../events/types';
import { extractionIntensity, producedValue } from '../formulas/production';
import { buildAdjacency, outEdges } from '../model/graph';
import { cloneWorld, sortedIds } from '../model/world';
import type { SimSystem } from './types';

export const PRODUCER_ROLES: ReadonlySet<SocialRole> = new Set([SocialRole.PeripheryProletariat, SocialRole.LaborAristocracy]);

export const ProductionSystem: SimSystem = {
  name: 'production',
  run(state, ctx) {
    const cfg = ctx.config.production;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];
    const tenancy = buildAdjacency(w, RelationshipKind.Tenancy);
    const output = new Map<TerritoryId, number>();

    for (const id of sortedIds(w.entities)) {
      const worker = w.entities[id];
      if (!PRODUCER_ROLES.has(worker.role)) continue;
      const land = outEdges(tenancy, id).find(r => w.territories[r.targetId] !== undefined);
      if (!land) continue;
      const t = w.territories[land.targetId];
      const produced = producedValue(cfg.baseLaborPower, cfg.ticksPerYear, worker.population, t.biocapacity, t.maxBiocapacity);
      if (produced <= 0) continue;
      worker.wealth += produced;
      output.set(t.id, (output.get(t.id) ?? 0) + produced);
      events.push({ kind: 'production', payload: { entityId: id, territoryId: t.id, amount: produced } });
    }

    // unworked land rests this tick
    for (const id of sortedIds(w.territories)) {
      const t = w.territories[id];
      t.extractionIntensity = extractionIntensity(output.get(id) ?? 0, t.maxBiocapacity);
    }

    return { state: w, events };
  },
};
