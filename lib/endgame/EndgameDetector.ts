// lib/endgame/EndgameDetector.ts
// Terminal conditions in fixed priority: victory, then collapse, then fascism.
// Fires at most once per run; the simulation stops on it.

import { EndgameOutcome } from '../../enums';
import type { WorldState } from '../../types';
import type { SimulationConfig } from '../config/schema';
import type { EventPayloads } from '../events/types';
import { digestWorld } from '../model/snapshot';
import { liberationIndex, repressionIndex, resistanceIndex } from './indices';

export const RESISTANCE_EPSILON = 1e-6;

/** Everything the detector carries between ticks; stored per tick so a rollback can restore it. */
export interface EndgameMemory {
  collapseStreak: number;
  fascismStreak: number;
  outcome: EndgameOutcome | null;
  firedAt: number | null;
}

export interface EndgameReadings {
  liberation: number;
  repression: number;
  resistance: number;
  overshoot: number;
}

export function readIndices(w: WorldState): EndgameReadings {
  return {
    liberation: liberationIndex(w),
    repression: repressionIndex(w),
    resistance: resistanceIndex(w),
    overshoot: w.aggregates.overshootRatio,
  };
}

export class EndgameDetector {
  private memory: EndgameMemory = { collapseStreak: 0, fascismStreak: 0, outcome: null, firedAt: null };

  constructor(private readonly cfg: SimulationConfig['endgame']) {}

  get outcome(): EndgameOutcome | null {
    return this.memory.outcome;
  }

  snapshot(): EndgameMemory {
    return { ...this.memory };
  }

  restore(memory: EndgameMemory): void {
    this.memory = { ...memory };
  }

  /**
   * Called once per committed tick. Streaks advance on every call; the payload is
   * returned only on the tick the first condition holds.
   */
  evaluate(w: WorldState): EventPayloads['endgame'] | null {
    const r = readIndices(w);
    const m = this.memory;
    m.collapseStreak = r.overshoot > this.cfg.collapseThreshold ? m.collapseStreak + 1 : 0;
    const ratio = r.repression / Math.max(r.resistance, RESISTANCE_EPSILON);
    m.fascismStreak = ratio > this.cfg.fascismRatio ? m.fascismStreak + 1 : 0;

    if (m.outcome !== null) return null;

    let outcome: EndgameOutcome | null = null;
    if (r.liberation > this.cfg.victoryThreshold || w.terminal?.decision === 'revolution') {
      outcome = EndgameOutcome.RevolutionaryVictory;
    } else if (m.collapseStreak >= this.cfg.collapseWindow) {
      outcome = EndgameOutcome.EcologicalCollapse;
    } else if (m.fascismStreak >= this.cfg.fascismWindow || w.terminal?.decision === 'genocide') {
      outcome = EndgameOutcome.FascistConsolidation;
    }
    if (outcome === null) return null;

    m.outcome = outcome;
    m.firedAt = w.tick;
    return { outcome, digest: digestWorld(w) };
  }
}
