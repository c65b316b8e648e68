// enums.ts
// Discrete categories shared by the world model, systems and observers.

export enum SocialRole {
  CoreBourgeoisie = 'core_bourgeoisie',
  CompradorBourgeoisie = 'comprador_bourgeoisie',
  LaborAristocracy = 'labor_aristocracy',
  PeripheryProletariat = 'periphery_proletariat',
  InternalProletariat = 'internal_proletariat',
  Lumpenproletariat = 'lumpenproletariat',
  CarceralEnforcer = 'carceral_enforcer',
}

export enum RelationshipKind {
  Extraction = 'extraction',
  Tribute = 'tribute',
  Wages = 'wages',
  ClientState = 'client_state',
  Solidarity = 'solidarity',
  Tenancy = 'tenancy',
  Adjacency = 'adjacency',
  Repression = 'repression',
}

export enum SectorType {
  Industrial = 'industrial',
  Residential = 'residential',
  Commercial = 'commercial',
  Agricultural = 'agricultural',
  Carceral = 'carceral',
  Extractive = 'extractive',
}

export enum TerritoryProfile {
  Low = 'low',
  High = 'high',
}

export enum Attractor {
  None = 'none',
  Liberation = 'liberation',
  Repression = 'repression',
}

export enum ContradictionKind {
  CapitalLabor = 'capital_labor',
  CorePeriphery = 'core_periphery',
  Metabolic = 'metabolic',
}

export enum ContradictionState {
  Latent = 'latent',
  Active = 'active',
  Critical = 'critical',
  Resolved = 'resolved',
  Ruptured = 'ruptured',
}

export enum ResolutionKind {
  Reform = 'reform',
  Suppression = 'suppression',
  Revolution = 'revolution',
}

export enum PolicyDecision {
  Crisis = 'crisis',
  Bribery = 'bribery',
  IronFist = 'iron_fist',
  Austerity = 'austerity',
  NoChange = 'no_change',
}

export enum EndgameOutcome {
  RevolutionaryVictory = 'revolutionary_victory',
  EcologicalCollapse = 'ecological_collapse',
  FascistConsolidation = 'fascist_consolidation',
}
