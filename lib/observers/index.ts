// lib/observers/index.ts

import type { SimulationConfig } from '../config/schema';
import { RandomStream } from '../core/noise';
import type { SimLogger } from '../diagnostics/logger';
import { CausalChainObserver } from './CausalChainObserver';
import { MetricsObserver } from './MetricsObserver';
import { NarrativeTriggerObserver } from './NarrativeTriggerObserver';
import { ObserverRegistry } from './registry';
import { TopologyMonitor } from './TopologyMonitor';

export * from './types';
export * from './registry';
export * from './MetricsObserver';
export * from './NarrativeTriggerObserver';
export * from './TopologyMonitor';
export * from './CausalChainObserver';

export type StandardObservers = {
  metrics: MetricsObserver;
  narrative: NarrativeTriggerObserver;
  topology: TopologyMonitor;
  causal: CausalChainObserver;
};

export function createStandardObservers(config: SimulationConfig, logger: SimLogger): ObserverRegistry<StandardObservers> {
  return new ObserverRegistry<StandardObservers>()
    .register('metrics', new MetricsObserver(config.engine.metricsWindow))
    .register('narrative', new NarrativeTriggerObserver(logger))
    .register(
      'topology',
      new TopologyMonitor(
        {
          resilienceInterval: config.engine.resilienceInterval,
          removalRate: config.engine.resilienceRemovalRate,
          rng: new RandomStream(config.engine.seed).fork('topology'),
        },
        logger,
      ),
    )
    .register('causal', new CausalChainObserver(logger));
}
