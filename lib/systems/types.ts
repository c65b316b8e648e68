// lib/systems/types.ts
// Contract shared by every pipeline stage.

import type { WorldState } from '../../types';
import type { SimulationConfig } from '../config/schema';
import type { RandomStream } from '../core/noise';
import type { EventDraft } from '../events/types';

export type SystemName =
  | 'production'
  | 'economic'
  | 'solidarity'
  | 'consciousness'
  | 'survival'
  | 'contradiction'
  | 'territory'
  | 'metabolism'
  | 'decomposition'
  | 'struggle'
  | 'templates';

export interface SystemContext {
  tick: number;
  config: SimulationConfig;
  /** Stream forked for this system and tick only. */
  rng: RandomStream;
  /** Committed snapshot the tick started from. */
  baseline: WorldState;
}

export interface SystemResult {
  state: WorldState;
  events: EventDraft[];
}

/**
 * A stage reads the whole world but writes only the copy it returns.
 * Policy violations are clamped and reported as events, never thrown.
 */
export interface SimSystem {
  name: SystemName;
  run(state: WorldState, ctx: SystemContext): SystemResult;
}
