// lib/observers/MetricsObserver.ts
// Rolling per-tick metrics over a bounded window.

import type { WorldState } from '../../types';
import type { SimEvent } from '../events/types';
import { sum, weightedMean } from '../util/math';
import type { SimulationObserver } from './types';

export interface MetricsSample {
  tick: number;
  totalWealth: number;
  /** Population-weighted. */
  meanConsciousness: number;
  maxPRevolution: number;
  overshoot: number;
  tension: number;
  imperialRentPool: number;
  eventCount: number;
}

export type MetricName = Exclude<keyof MetricsSample, 'tick'>;

export function sampleWorld(w: WorldState, eventCount: number): MetricsSample {
  const all = Object.keys(w.entities)
    .sort()
    .map(id => w.entities[id]);
  return {
    tick: w.tick,
    totalWealth: sum(all.map(e => e.wealth)),
    meanConsciousness: weightedMean(
      all.map(e => e.ideology.consciousness),
      all.map(e => e.population),
    ),
    maxPRevolution: all.reduce((m, e) => Math.max(m, e.pRevolution), 0),
    overshoot: w.aggregates.overshootRatio,
    tension: w.aggregates.globalTension,
    imperialRentPool: w.aggregates.imperialRentPool,
    eventCount,
  };
}

export class MetricsObserver implements SimulationObserver {
  readonly tag = 'metrics';
  private window: MetricsSample[] = [];

  constructor(readonly windowSize: number) {}

  onStart(initial: WorldState): void {
    this.window = [sampleWorld(initial, 0)];
  }

  onTick(_before: WorldState, after: WorldState, events: readonly SimEvent[]): void {
    this.window.push(sampleWorld(after, events.length));
    if (this.window.length > this.windowSize) this.window.splice(0, this.window.length - this.windowSize);
  }

  samples(): readonly MetricsSample[] {
    return this.window.slice();
  }

  latest(): MetricsSample | undefined {
    return this.window[this.window.length - 1];
  }

  /** Mean of one metric over the window; 0 when empty. */
  mean(name: MetricName): number {
    if (!this.window.length) return 0;
    return sum(this.window.map(s => s[name])) / this.window.length;
  }

  series(name: MetricName): number[] {
    return this.window.map(s => s[name]);
  }
}
