// lib/observers/NarrativeTriggerObserver.ts
// Queues narrative frames for the events a storyteller downstream cares about.

import type { WorldState } from '../../types';
import type { SimLogger } from '../diagnostics/logger';
import { describeError } from '../diagnostics/errors';
import type { SimEvent } from '../events/types';
import { resolveFormula } from '../formulas/registry';
import type { SimulationObserver } from './types';

export type NarrativeKind = 'uprising' | 'contradiction_rupture' | 'class_decomposition' | 'terminal_decision' | 'template' | 'endgame';

export interface NarrativeFrame {
  tick: number;
  eventId: string;
  kind: NarrativeKind;
  headline: string;
  /** Resolved formula or figures behind the headline. */
  detail: string;
}

function frameFor(event: SimEvent, after: WorldState): NarrativeFrame | null {
  const base = { tick: event.tick, eventId: event.id };
  switch (event.kind) {
    case 'uprising': {
      const cls = after.entities[event.payload.entityId];
      if (!cls) throw new Error(`unknown class ${event.payload.entityId}`);
      return {
        ...base,
        kind: 'uprising',
        headline: `${cls.name} rises up (${event.payload.trigger})`,
        detail: `P(S|R) = ${resolveFormula('revolutionProbability', { cohesion: cls.organization, repression: cls.repressionFaced })}`,
      };
    }
    case 'contradiction_rupture': {
      const k = after.contradictions[event.payload.contradictionId];
      if (!k) throw new Error(`unknown contradiction ${event.payload.contradictionId}`);
      return {
        ...base,
        kind: 'contradiction_rupture',
        headline: `${k.name} ruptures`,
        detail: `intensity ${event.payload.intensity.toFixed(3)} for ${event.payload.ticksAboveCeiling} ticks`,
      };
    }
    case 'class_decomposition':
      return {
        ...base,
        kind: 'class_decomposition',
        headline: `${event.payload.entityId} splits into enforcers and prisoners`,
        detail: `wage rate ${event.payload.wageRate.toFixed(3)}`,
      };
    case 'terminal_decision':
      return {
        ...base,
        kind: 'terminal_decision',
        headline: `control ratio broken: ${event.payload.decision}`,
        detail: `prisoner organization ${event.payload.prisonerOrganization.toFixed(3)}`,
      };
    case 'template_triggered': {
      // silent templates only change the world
      if (event.payload.signal === null) return null;
      const on = event.payload.matchedNodes.length ? event.payload.matchedNodes.join(', ') : 'world';
      return {
        ...base,
        kind: 'template',
        headline: `${event.payload.templateId}: ${event.payload.signal}`,
        detail: `resolution ${event.payload.resolutionId} on ${on}`,
      };
    }
    case 'endgame':
      return { ...base, kind: 'endgame', headline: `endgame: ${event.payload.outcome}`, detail: `digest ${event.payload.digest}` };
    default:
      return null;
  }
}

export class NarrativeTriggerObserver implements SimulationObserver {
  readonly tag = 'narrative';
  private queue: NarrativeFrame[] = [];

  constructor(private readonly logger: SimLogger) {}

  onTick(_before: WorldState, after: WorldState, events: readonly SimEvent[]): void {
    for (const event of events) {
      try {
        const frame = frameFor(event, after);
        if (frame) this.queue.push(frame);
      } catch (err) {
        this.logger.warn(`[observer:narrative] skipped ${event.id} (${event.kind}): ${describeError(err)}`);
      }
    }
  }

  pending(): readonly NarrativeFrame[] {
    return this.queue.slice();
  }

  /** Hands the queued frames to the consumer and empties the queue. */
  drainFrames(): NarrativeFrame[] {
    const out = this.queue;
    this.queue = [];
    return out;
  }
}
