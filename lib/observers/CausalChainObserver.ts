// lib/observers/CausalChainObserver.ts
// Watches for crash -> austerity -> radicalization inside a short rolling window.

import type { WorldState } from '../../types';
import type { SimLogger } from '../diagnostics/logger';
import type { SimulationObserver } from './types';

export const CHAIN_WINDOW = 5;
/** Pool has to fall to this share of the previous tick to count as a crash. */
export const CRASH_RATIO = 0.8;

interface TickSignals {
  tick: number;
  crash: boolean;
  wageCut: boolean;
  radicalization: boolean;
}

export interface CausalFrame {
  crashTick: number;
  austerityTick: number;
  radicalizationTick: number;
}

function maxPRevolution(w: WorldState): number {
  return Object.values(w.entities).reduce((m, e) => Math.max(m, e.pRevolution), 0);
}

export class CausalChainObserver implements SimulationObserver {
  readonly tag = 'causal';
  private window: TickSignals[] = [];
  private found: CausalFrame[] = [];

  constructor(private readonly logger: SimLogger) {}

  onTick(before: WorldState, after: WorldState): void {
    const pool = before.aggregates.imperialRentPool;
    this.window.push({
      tick: after.tick,
      crash: pool > 0 && after.aggregates.imperialRentPool <= pool * CRASH_RATIO,
      wageCut: after.aggregates.wageRate < before.aggregates.wageRate,
      radicalization: maxPRevolution(after) > maxPRevolution(before),
    });
    if (this.window.length > CHAIN_WINDOW) this.window.shift();

    const frame = this.match();
    if (!frame) return;
    this.found.push(frame);
    this.window = [];
    this.logger.info(
      `[observer:causal] crash@${frame.crashTick} -> austerity@${frame.austerityTick} -> radicalization@${frame.radicalizationTick}`,
    );
  }

  /** Earliest crash, then the first wage cut no earlier, then the first rise no earlier than that. */
  private match(): CausalFrame | null {
    const crash = this.window.find(s => s.crash);
    if (!crash) return null;
    const austerity = this.window.find(s => s.tick >= crash.tick && s.wageCut);
    if (!austerity) return null;
    const rise = this.window.find(s => s.tick >= austerity.tick && s.radicalization);
    if (!rise) return null;
    return { crashTick: crash.tick, austerityTick: austerity.tick, radicalizationTick: rise.tick };
  }

  frames(): readonly CausalFrame[] {
    return this.found.slice();
  }
}
