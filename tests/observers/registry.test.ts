import { describe, expect, it } from 'vitest';

import { DEFAULT_CONFIG } from '@/lib/config/load';
import { silentLogger } from '@/lib/diagnostics/logger';
import { Simulation } from '@/lib/engine/simulation';
import { createStandardObservers, MetricsObserver, ObserverRegistry } from '@/lib/observers';
import type { SimulationObserver } from '@/lib/observers';
import { loadScenario } from '@/data/scenarios';

const noop = (tag: string): SimulationObserver => ({ tag, onTick: () => undefined });

describe('ObserverRegistry', () => {
  it('keeps registration order and typed lookups', () => {
    const registry = createStandardObservers(DEFAULT_CONFIG, silentLogger);
    expect(registry.size).toBe(4);
    expect(registry.list().map(o => o.tag)).toEqual(['metrics', 'narrative', 'topology', 'causal']);
    expect(registry.require('metrics')).toBeInstanceOf(MetricsObserver);
  });

  it('rejects a tag mismatch and duplicates', () => {
    const registry = new ObserverRegistry<{ a: SimulationObserver }>();
    expect(() => registry.register('a', noop('b'))).toThrow('[observers] tag mismatch: registered as "a", observer says "b"');
    registry.register('a', noop('a'));
    expect(() => registry.register('a', noop('a'))).toThrow('[observers] duplicate tag "a"');
  });

  it('throws on a required tag that was never registered', () => {
    const registry = new ObserverRegistry<{ a: SimulationObserver }>();
    expect(registry.get('a')).toBeUndefined();
    expect(() => registry.require('a')).toThrow('[observers] no observer registered as "a"');
  });

  it('drives the standard set through a run', async () => {
    const observers = createStandardObservers(DEFAULT_CONFIG, silentLogger);
    const sim = new Simulation({ initialState: loadScenario('two-node'), observers, logger: silentLogger });
    await sim.run({ maxTicks: 10 });

    const metrics = observers.require('metrics');
    expect(metrics.samples()).toHaveLength(11);
    expect(metrics.latest()?.tick).toBe(10);
    expect(observers.require('topology').snapshots()).toHaveLength(11);
  });
});
