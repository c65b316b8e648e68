// types.ts
// World model shared by systems, observers and the simulation loop.

import type {
  Attractor,
  ContradictionKind,
  ContradictionState,
  RelationshipKind,
  ResolutionKind,
  SectorType,
  SocialRole,
  TerritoryProfile,
} from './enums';

export type EntityId = string;
export type TerritoryId = string;
export type NodeId = EntityId | TerritoryId;
export type RelationshipId = string;
export type ContradictionId = string;

// --- Nodes ---

export interface Ideology {
  /** -1..1; positive leans towards class consciousness, negative towards reactionary identity. */
  consciousness: number;
  /** 0..1, accumulated from perceived losses and decaying each tick. */
  agitation: number;
  attractor: Attractor;
  /** Ticks spent in the current attractor. 0 while unrouted. */
  routedTicks: number;
}

export interface SocialClass {
  id: EntityId;
  name: string;
  role: SocialRole;
  wealth: number;
  organization: number;        // 0..1
  repressionFaced: number;     // 0..1
  subsistenceThreshold: number;
  population: number;
  ideology: Ideology;
  pAcquiescence: number;       // 0..1
  pRevolution: number;         // 0..1
  territoryId: TerritoryId | null;
}

export interface Territory {
  id: TerritoryId;
  name: string;
  sector: SectorType;
  profile: TerritoryProfile;
  heat: number;                // 0..1
  population: number;
  rent: number;
  evicting: boolean;
  biocapacity: number;
  maxBiocapacity: number;
  regenerationRate: number;    // 0..1
  extractionIntensity: number; // 0..1
}

// --- Edges ---

export interface Relationship {
  id: RelationshipId;
  kind: RelationshipKind;
  sourceId: NodeId;
  targetId: NodeId;
  strength: number;            // 0..1
  /** Value moved along the edge during the last tick. */
  flow: number;
}

// --- Contradictions ---

export interface Contradiction {
  id: ContradictionId;
  name: string;
  kind: ContradictionKind;
  thesisId: NodeId;
  antithesisId: NodeId;
  intensity: number;           // 0..1
  state: ContradictionState;
  ticksAboveCeiling: number;
  generation: number;
  parentId: ContradictionId | null;
}

// --- Commands (consumed by the contradiction system) ---

export interface ResolveContradictionCommand {
  id: string;
  kind: 'resolve_contradiction';
  issuedAt: number;
  issuedBy: string;
  contradictionId: ContradictionId;
  resolution: ResolutionKind;
}

export type WorldCommand = ResolveContradictionCommand;

// --- Aggregates ---

export interface WorldAggregates {
  imperialRentPool: number;
  wageRate: number;            // 0..1
  globalTension: number;       // 0..1
  overshootRatio: number;
  consumption: number;
}

export type TerminalDecision = 'revolution' | 'genocide';

export interface TerminalDecisionRecord {
  tick: number;
  decision: TerminalDecision;
  prisonerOrganization: number;
}

// --- Snapshot ---

export interface WorldState {
  tick: number;
  entities: Record<EntityId, SocialClass>;
  territories: Record<TerritoryId, Territory>;
  relationships: Record<RelationshipId, Relationship>;
  contradictions: Record<ContradictionId, Contradiction>;
  aggregates: WorldAggregates;
  commands: WorldCommand[];
  terminal: TerminalDecisionRecord | null;
  /** Event template id -> tick it last fired. */
  templateTriggers: Record<string, number>;
}
