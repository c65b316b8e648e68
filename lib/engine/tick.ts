// lib/engine/tick.ts
// One atomic tick: every system in order over a private draft, then a frozen commit.

import type { WorldCommand, WorldState } from '../../types';
import type { SimulationConfig } from '../config/schema';
import type { RandomStream } from '../core/noise';
import { ConfigurationError, describeError } from '../diagnostics/errors';
import { diagnosticEvent } from '../diagnostics/report';
import { TickEventLog } from '../events/log';
import type { SimEvent } from '../events/types';
import { enforceInvariants } from '../model/invariants';
import { cloneWorld, freezeWorld } from '../model/world';
import { PIPELINE } from '../systems/pipeline';
import type { SimSystem, SystemResult } from '../systems/types';

export interface TickOptions {
  /** Commands queued from outside the pipeline (observers, callers) for this tick. */
  commands?: readonly WorldCommand[];
  /** Override of the system order; tests use it to isolate stages. */
  systems?: readonly SimSystem[];
}

export interface TickResult {
  state: WorldState;
  events: readonly SimEvent[];
}

/**
 * Advance `state` by one tick. The input is never touched; the returned state is
 * deep-frozen. Each system gets its own stream forked from `rng` by tick and name.
 */
export function runTick(
  state: WorldState,
  config: SimulationConfig,
  rng: RandomStream,
  opts: TickOptions = {},
): TickResult {
  const tick = state.tick + 1;
  const tickRng = rng.fork(`tick:${tick}`);
  const log = new TickEventLog(tick);

  let working = cloneWorld(state);
  working.tick = tick;
  if (opts.commands?.length) working.commands.push(...structuredClone(opts.commands));

  for (const system of opts.systems ?? PIPELINE) {
    let result: SystemResult;
    try {
      result = system.run(working, { tick, config, rng: tickRng.fork(system.name), baseline: state });
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      // the stage's output is dropped; the draft continues from the previous stage
      log.append(system.name, [
        {
          kind: 'diagnostic',
          payload: { code: 'SYSTEM_FAILURE', system: system.name, message: describeError(err) },
        },
      ]);
      continue;
    }
    const repairs = enforceInvariants(result.state);
    working = result.state;
    working.tick = tick;
    log.append(system.name, result.events);
    log.append(system.name, repairs.map(e => diagnosticEvent(system.name, e)));
  }

  return { state: freezeWorld(working), events: log.seal() };
}
