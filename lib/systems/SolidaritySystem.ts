// lib/systems/SolidaritySystem.ts
// Consciousness diffuses along solidarity edges; edges decay, weak ones are pruned, new ones form.

import { RelationshipKind } from '../../enums';
import type { EntityId } from '../../types';
import type { EventDraft } from '../events/types';
import { decayEdge, shouldPrune, solidarityTransmission } from '../formulas/solidarity';
import { buildAdjacency, edgesOfKind, hasEdgeBetween } from '../model/graph';
import { cloneWorld, EXPLOITED_ROLES, makeRelationship, relationshipId, sortedIds } from '../model/world';
import { clampSigned } from '../util/math';
import type { SimSystem } from './types';

export const SolidaritySystem: SimSystem = {
  name: 'solidarity',
  run(state, ctx) {
    const cfg = ctx.config.solidarity;
    const w = cloneWorld(state);
    const events: EventDraft[] = [];

    // 1) transmission, all edges read the same pre-transmission consciousness
    const received = new Map<EntityId, number>();
    for (const edge of edgesOfKind(w, RelationshipKind.Solidarity)) {
      const source = state.entities[edge.sourceId];
      const target = state.entities[edge.targetId];
      if (!source || !target) continue;
      const amount = solidarityTransmission(
        source.ideology.consciousness,
        target.ideology.consciousness,
        edge.strength,
        cfg.activationThreshold,
      );
      if (amount <= 0) continue;
      received.set(target.id, (received.get(target.id) ?? 0) + amount);
      events.push({ kind: 'solidarity_transmission', payload: { sourceId: source.id, targetId: target.id, amount } });
    }
    for (const [id, amount] of received) {
      const e = w.entities[id];
      e.ideology.consciousness = clampSigned(e.ideology.consciousness + amount);
    }

    // 2) geometric decay, then prune
    for (const edge of edgesOfKind(w, RelationshipKind.Solidarity)) {
      edge.strength = decayEdge(edge.strength, cfg.decayRate);
      if (shouldPrune(edge.strength, cfg.pruneThreshold)) {
        delete w.relationships[edge.id];
        events.push({
          kind: 'edge_pruned',
          payload: { relationshipId: edge.id, sourceId: edge.sourceId, targetId: edge.targetId, strength: edge.strength },
        });
      }
    }

    // 3) conscious exploited classes sharing a territory find each other
    const adj = buildAdjacency(w, RelationshipKind.Solidarity);
    const byTerritory = new Map<string, EntityId[]>();
    for (const id of sortedIds(w.entities)) {
      const e = w.entities[id];
      if (e.territoryId === null || !EXPLOITED_ROLES.has(e.role)) continue;
      if (e.ideology.consciousness < cfg.formationThreshold) continue;
      const list = byTerritory.get(e.territoryId) ?? [];
      list.push(id);
      byTerritory.set(e.territoryId, list);
    }
    for (const territoryId of [...byTerritory.keys()].sort()) {
      const members = byTerritory.get(territoryId) ?? [];
      for (let i = 0; i < members.length; i++) {
        for (let j = i + 1; j < members.length; j++) {
          if (hasEdgeBetween(adj, members[i], members[j])) continue;
          const a = w.entities[members[i]];
          const b = w.entities[members[j]];
          const [source, target] = b.ideology.consciousness > a.ideology.consciousness ? [b, a] : [a, b];
          const id = relationshipId(RelationshipKind.Solidarity, source.id, target.id);
          if (w.relationships[id]) continue;
          const edge = makeRelationship({
            id,
            kind: RelationshipKind.Solidarity,
            sourceId: source.id,
            targetId: target.id,
            strength: cfg.initialStrength,
          });
          w.relationships[id] = edge;
          events.push({
            kind: 'edge_formed',
            payload: { relationshipId: id, sourceId: source.id, targetId: target.id, strength: edge.strength },
          });
        }
      }
    }

    return { state: w, events };
  },
};
