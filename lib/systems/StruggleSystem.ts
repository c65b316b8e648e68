// lib/systems/StruggleSystem.ts
// Uprisings: a repression spark or a favourable survival calculus, gated by agitation.

import { ContradictionState, RelationshipKind, ResolutionKind } from '../../enums';
import type { EventDraft } from '../events/types';
import { buildAdjacency, incidentEdges } from '../model/graph';
import { cloneWorld, EXPLOITED_ROLES, sortedIds } from '../model/world';
import { clamp01, clampSigned } from '../util/math';
import type { SimSystem } from './types';

export const StruggleSystem: SimSystem = {
  name: 'struggle',
  run(state, ctx) {
    const cfg = ctx.config.struggle;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];
    const adj = buildAdjacency(w, RelationshipKind.Solidarity);

    for (const id of sortedIds(w.entities)) {
      const cls = w.entities[id];
      if (!EXPLOITED_ROLES.has(cls.role)) continue;

      // the spark is drawn for every exploited class so the stream stays aligned across runs
      const spark = ctx.rng.chance(cls.repressionFaced * cfg.sparkScale);
      const calculus = cls.pRevolution > cls.pAcquiescence;
      if (!(spark || calculus) || cls.ideology.agitation <= cfg.agitationThreshold) continue;

      const wealthDestroyed = cls.wealth * cfg.wealthDestructionRate;
      cls.wealth -= wealthDestroyed;
      cls.ideology.consciousness = clampSigned(cls.ideology.consciousness + cfg.consciousnessBoost);
      events.push({ kind: 'uprising', payload: { entityId: id, trigger: calculus ? 'calculus' : 'spark', wealthDestroyed } });

      const edges = incidentEdges(adj, id);
      for (const edge of edges) edge.strength = clamp01(edge.strength + cfg.solidarityBoost);
      if (edges.length) {
        events.push({ kind: 'solidarity_spike', payload: { entityId: id, edges: edges.length, boost: cfg.solidarityBoost } });
      }

      for (const kid of sortedIds(w.contradictions)) {
        const k = w.contradictions[kid];
        if (k.antithesisId !== id || k.state !== ContradictionState.Critical) continue;
        if (w.commands.some(c => c.contradictionId === kid)) continue;
        w.commands.push({
          id: `cmd:${ctx.tick}:struggle:${kid}`,
          kind: 'resolve_contradiction',
          issuedAt: ctx.tick,
          issuedBy: 'struggle',
          contradictionId: kid,
          resolution: calculus ? ResolutionKind.Revolution : ResolutionKind.Suppression,
        });
      }
    }

    return { state: w, events };
  },
};
