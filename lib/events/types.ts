// lib/events/types.ts
// Typed, tick-stamped events emitted by systems during a tick.

import type {
  Attractor,
  ContradictionKind,
  ContradictionState,
  EndgameOutcome,
  PolicyDecision,
  ResolutionKind,
} from '../../enums';
import type { SimulationErrorCode } from '../diagnostics/errors';
import type { TerminalDecision } from '../../types';
import type { TemplateCategory } from '../templates/schema';

export interface EventPayloads {
  production: { entityId: string; territoryId: string; amount: number };
  surplus_extraction: { sourceId: string; targetId: string; amount: number; mechanism: 'imperial_rent' | 'tribute' | 'wages' };
  imperial_subsidy: { sourceId: string; targetId: string; amount: number; repressionBoost: number; stabilityRatio: number };
  policy_decision: { decision: PolicyDecision; poolRatio: number; wageRate: number; repressionDelta: number };
  economic_crisis: { poolRatio: number; pool: number };
  solidarity_transmission: { sourceId: string; targetId: string; amount: number };
  edge_pruned: { relationshipId: string; sourceId: string; targetId: string; strength: number };
  edge_formed: { relationshipId: string; sourceId: string; targetId: string; strength: number };
  consciousness_routed: { entityId: string; from: Attractor; to: Attractor; consciousness: number };
  survival_crossover: { entityId: string; pAcquiescence: number; pRevolution: number };
  contradiction_transition: { contradictionId: string; kind: ContradictionKind; from: ContradictionState; to: ContradictionState; intensity: number };
  contradiction_rupture: { contradictionId: string; kind: ContradictionKind; intensity: number; ticksAboveCeiling: number };
  command_applied: { commandId: string; issuedBy: string; contradictionId: string; resolution: ResolutionKind };
  contradiction_resolved: { contradictionId: string; resolution: ResolutionKind; reseeded: string[] };
  eviction_started: { territoryId: string; heat: number; rent: number };
  displacement: { territoryId: string; displaced: number; population: number };
  ecological_overshoot: { overshootRatio: number; consumption: number; biocapacity: number };
  class_decomposition: { entityId: string; enforcerId: string; proletariatId: string; wageRate: number };
  control_ratio_crisis: { guards: number; prisoners: number; capacity: number };
  terminal_decision: { decision: TerminalDecision; prisonerOrganization: number };
  uprising: { entityId: string; trigger: 'spark' | 'calculus'; wealthDestroyed: number };
  solidarity_spike: { entityId: string; edges: number; boost: number };
  template_triggered: {
    templateId: string;
    resolutionId: string;
    category: TemplateCategory;
    matchedNodes: string[];
    signal: string | null;
    detail: Record<string, string | number | boolean>;
  };
  endgame: { outcome: EndgameOutcome; digest: string };
  diagnostic: { code: SimulationErrorCode; system: string; message: string; subjectId?: string };
}

export type EventKind = keyof EventPayloads;

/** What a system hands back; the tick runner stamps ids, tick and order. */
export type EventDraft = { [K in EventKind]: { kind: K; payload: EventPayloads[K] } }[EventKind];

export interface EventStamp {
  id: string;
  tick: number;
  sequence: number;
  system: string;
}

export type SimEvent = EventDraft & EventStamp;

export type EventOf<K extends EventKind> = Extract<SimEvent, { kind: K }>;

export function isEventOf<K extends EventKind>(event: SimEvent, kind: K): event is EventOf<K> {
  return event.kind === kind;
}
