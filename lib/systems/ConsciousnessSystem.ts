// lib/systems/ConsciousnessSystem.ts
// Losses agitate; agitation drifts consciousness; drift is routed into one of two attractors.

import { Attractor, RelationshipKind } from '../../enums';
import type { EventDraft } from '../events/types';
import { accumulateAgitation, agitationSignal, consciousnessDrift, routeAttractor } from '../formulas/consciousness';
import { buildAdjacency, incidentEdges } from '../model/graph';
import { cloneWorld, sortedIds } from '../model/world';
import { clampSigned } from '../util/math';
import type { SimSystem } from './types';

export const ConsciousnessSystem: SimSystem = {
  name: 'consciousness',
  run(state, ctx) {
    const cfg = ctx.config.consciousness;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];
    const solidarity = buildAdjacency(w, RelationshipKind.Solidarity);

    for (const id of sortedIds(w.entities)) {
      const e = w.entities[id];
      const ideology = e.ideology;
      const previousWealth = ctx.baseline.entities[id]?.wealth ?? e.wealth;

      const signal = agitationSignal(previousWealth, e.wealth, ctx.config.survival.lossAversion);
      ideology.agitation = accumulateAgitation(ideology.agitation, signal, cfg.agitationDecay);

      // bonds decide which way agitation points
      let bonds = 0;
      for (const edge of incidentEdges(solidarity, id)) bonds += edge.strength;

      const drift = consciousnessDrift({
        consciousness: ideology.consciousness,
        agitation: ideology.agitation,
        liberationShare: Math.min(1, bonds),
        sensitivity: cfg.sensitivity,
        decay: cfg.decayRate,
        ceiling: cfg.driftCeiling,
        attractor: ideology.attractor,
        routedTicks: ideology.routedTicks,
        pathGain: cfg.pathGain,
        pathHorizon: cfg.pathHorizon,
      });
      ideology.consciousness = clampSigned(ideology.consciousness + drift);

      const from = ideology.attractor;
      const to = routeAttractor(from, ideology.consciousness, cfg.enterBand, cfg.releaseBand);
      ideology.attractor = to;
      ideology.routedTicks = to === Attractor.None ? 0 : to === from ? ideology.routedTicks + 1 : 1;
      if (to !== from) {
        events.push({ kind: 'consciousness_routed', payload: { entityId: id, from, to, consciousness: ideology.consciousness } });
      }
    }

    return { state: w, events };
  },
};
