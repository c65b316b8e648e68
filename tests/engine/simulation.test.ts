import { describe, expect, it } from 'vitest';

import { EndgameOutcome, ResolutionKind, SocialRole } from '@/enums';
import type { WorldCommand, WorldState } from '@/types';
import { loadConfig } from '@/lib/config/load';
import { silentLogger } from '@/lib/diagnostics/logger';
import { Simulation } from '@/lib/engine/simulation';
import { digestWorld } from '@/lib/model/snapshot';
import { cloneWorld, createWorld, makeSocialClass } from '@/lib/model/world';
import { ObserverRegistry } from '@/lib/observers/registry';
import type { SimulationObserver } from '@/lib/observers/types';
import type { SimSystem } from '@/lib/systems/types';
import { loadScenario } from '@/data/scenarios';

import { collapseWorld, recordingLogger } from '../support/fixtures';

// no endgame can fire: victory needs liberation above 1 and decomposition never triggers
const QUIET = loadConfig({
  endgame: { victoryThreshold: 1, collapseWindow: 1000, fascismWindow: 1000 },
  decomposition: { crisisWageRate: 0 },
});

function command(id: string, contradictionId: string): WorldCommand {
  return { id, kind: 'resolve_contradiction', issuedAt: 0, issuedBy: 'test', contradictionId, resolution: ResolutionKind.Reform };
}

describe('Simulation', () => {
  it('is deterministic for a seed', async () => {
    const a = new Simulation({ initialState: loadScenario('imperial-circuit'), config: QUIET, logger: silentLogger });
    const b = new Simulation({ initialState: loadScenario('imperial-circuit'), config: QUIET, logger: silentLogger });
    await a.run({ maxTicks: 15 });
    await b.run({ maxTicks: 15 });

    expect(a.tick).toBe(15);
    expect(digestWorld(a.state)).toBe(digestWorld(b.state));
    const kinds = (s: Simulation) => s.history.toArray().flatMap(r => r.events.map(e => e.id + e.kind));
    expect(kinds(a)).toEqual(kinds(b));
  });

  it('contains observer failures and keeps notifying the rest', async () => {
    const logger = recordingLogger();
    let seen = 0;
    const observers = new ObserverRegistry<{ broken: SimulationObserver; rejecting: SimulationObserver; counter: SimulationObserver }>()
      .register('broken', {
        tag: 'broken',
        onTick() {
          throw new Error('kaput');
        },
      })
      .register('rejecting', { tag: 'rejecting', onTick: () => Promise.reject(new Error('later')) })
      .register('counter', {
        tag: 'counter',
        onTick() {
          seen++;
        },
      });
    const sim = new Simulation({ initialState: loadScenario('two-node'), observers, logger });

    const record = await sim.step();

    expect(seen).toBe(1);
    expect(record.observerErrors.map(e => e.observerTag)).toEqual(['broken', 'rejecting']);
    expect(logger.lines.filter(l => l.level === 'error').map(l => l.message)).toEqual([
      '[observer:broken] observer "broken" failed at tick 1: kaput',
      '[observer:rejecting] observer "rejecting" failed at tick 1: later',
    ]);
    expect(sim.tick).toBe(1);
  });

  it('hands observers frozen committed snapshots', async () => {
    const frozen: boolean[] = [];
    const observers = new ObserverRegistry<{ watcher: SimulationObserver }>().register('watcher', {
      tag: 'watcher',
      onTick(before, after) {
        frozen.push(Object.isFrozen(before), Object.isFrozen(after.entities.core), after.tick - before.tick === 1);
      },
    });
    const sim = new Simulation({ initialState: loadScenario('two-node'), observers, logger: silentLogger });
    await sim.step();
    expect(frozen).toEqual([true, true, true]);
  });

  it('stops between ticks when the signal aborts', async () => {
    const controller = new AbortController();
    const observers = new ObserverRegistry<{ stopper: SimulationObserver }>().register('stopper', {
      tag: 'stopper',
      onTick(_before, after) {
        if (after.tick === 3) controller.abort();
      },
    });
    const logger = recordingLogger();
    const sim = new Simulation({ initialState: loadScenario('two-node'), observers, logger });

    const summary = await sim.run({ maxTicks: 100, signal: controller.signal });

    expect(summary.ticks).toBe(3);
    expect(summary.stoppedBy).toBe('aborted');
    expect(summary.outcome).toBeNull();
    expect(logger.lines.at(-1)).toEqual({ level: 'info', message: '[engine] stopped by signal at tick 3' });
  });

  it('ends at the tick limit without an outcome and calls onEnd for each stopped run', async () => {
    const calls: string[] = [];
    const observers = new ObserverRegistry<{ life: SimulationObserver }>().register('life', {
      tag: 'life',
      onStart: initial => {
        calls.push(`start:${initial.tick}`);
      },
      onTick: () => undefined,
      onEnd: (final, outcome) => {
        calls.push(`end:${final.tick}:${String(outcome)}`);
      },
    });
    const sim = new Simulation({ initialState: loadScenario('two-node'), observers, logger: silentLogger });

    const summary = await sim.run({ maxTicks: 4 });
    await sim.run({ maxTicks: 2 });

    expect(summary).toMatchObject({ ticks: 4, stoppedBy: 'max_ticks', outcome: null });
    expect(sim.tick).toBe(6);
    expect(calls).toEqual(['start:0', 'end:4:null', 'end:6:null']);
  });

  it('reports a later endgame to onEnd after an earlier run stopped at its tick limit', async () => {
    const calls: string[] = [];
    const observers = new ObserverRegistry<{ life: SimulationObserver }>().register('life', {
      tag: 'life',
      onTick: () => undefined,
      onEnd: (final, outcome) => {
        calls.push(`end:${final.tick}:${String(outcome)}`);
      },
    });
    const sim = new Simulation({ initialState: collapseWorld(), observers, logger: silentLogger });

    await sim.run({ maxTicks: 2 });
    const summary = await sim.run({ maxTicks: 10 });

    expect(summary).toMatchObject({ ticks: 3, stoppedBy: 'endgame', outcome: EndgameOutcome.EcologicalCollapse });
    expect(calls).toEqual(['end:2:null', `end:5:${EndgameOutcome.EcologicalCollapse}`]);
  });

  it('runs overlapping steps one after another, observers included', async () => {
    const order: string[] = [];
    const observers = new ObserverRegistry<{ slow: SimulationObserver }>().register('slow', {
      tag: 'slow',
      async onTick(before, after) {
        order.push(`start ${before.tick}->${after.tick}`);
        await new Promise<void>(resolve => setTimeout(resolve, 5));
        order.push(`end ${before.tick}->${after.tick}`);
      },
    });
    const sim = new Simulation({ initialState: loadScenario('two-node'), observers, logger: silentLogger });

    const records = await Promise.all([sim.step(), sim.step()]);

    expect(records.map(r => r.tick)).toEqual([1, 2]);
    expect(order).toEqual(['start 0->1', 'end 0->1', 'start 1->2', 'end 1->2']);
  });

  it('keeps the step queue going after a step is refused', async () => {
    const sim = new Simulation({ initialState: loadScenario('carceral'), logger: silentLogger });

    const [first, second, third] = await Promise.allSettled([sim.step(), sim.step(), sim.step()]);

    expect(first).toMatchObject({ status: 'fulfilled', value: { tick: 1 } });
    expect(second.status).toBe('rejected');
    if (second.status === 'rejected') {
      expect(String(second.reason)).toBe('Error: [engine] run already ended with revolutionary_victory at tick 1');
    }
    expect(third.status).toBe('rejected');
    expect(sim.tick).toBe(1);
  });

  it('replays identically after a rollback', async () => {
    const sim = new Simulation({ initialState: loadScenario('imperial-circuit'), config: QUIET, logger: silentLogger });
    await sim.run({ maxTicks: 5 });
    const digest = digestWorld(sim.state);

    const restored = sim.rollbackTo(3);
    expect(restored.tick).toBe(3);
    expect(sim.history.ticks()).toEqual([0, 1, 2, 3]);

    await sim.step();
    await sim.step();
    expect(digestWorld(sim.state)).toBe(digest);
  });

  it('refuses to roll back to a tick it no longer holds', () => {
    const sim = new Simulation({ initialState: loadScenario('two-node'), logger: silentLogger });
    expect(() => sim.rollbackTo(7)).toThrow('[engine] tick 7 is not in history');
  });

  it('appends the endgame event and refuses to step past it', async () => {
    const logger = recordingLogger();
    const outcomes: Array<EndgameOutcome | null> = [];
    const observers = new ObserverRegistry<{ end: SimulationObserver }>().register('end', {
      tag: 'end',
      onTick: () => undefined,
      onEnd: (_final, outcome) => {
        outcomes.push(outcome);
      },
    });
    const sim = new Simulation({ initialState: loadScenario('carceral'), observers, logger });

    const record = await sim.step();
    const last = record.events[record.events.length - 1];
    expect(last.kind).toBe('endgame');
    expect(last.system).toBe('endgame');
    expect(last.sequence).toBe(record.events.length - 1);
    expect(last.payload).toEqual({ outcome: EndgameOutcome.RevolutionaryVictory, digest: digestWorld(sim.state) });
    expect(outcomes).toEqual([EndgameOutcome.RevolutionaryVictory]);

    await expect(sim.step()).rejects.toThrow('[engine] run already ended with revolutionary_victory at tick 1');
    expect(await sim.run()).toMatchObject({ ticks: 0, stoppedBy: 'endgame', outcome: EndgameOutcome.RevolutionaryVictory });
  });

  it('ends in fascist consolidation when unorganized prisoners overwhelm the guards', async () => {
    const initialState = loadScenario('carceral');
    initialState.entities.inmates.organization = 0.3;
    const sim = new Simulation({ initialState, logger: silentLogger });
    const summary = await sim.run({ maxTicks: 10 });
    expect(summary).toMatchObject({ ticks: 1, stoppedBy: 'endgame', outcome: EndgameOutcome.FascistConsolidation });
  });

  it('feeds enqueued and observer-drained commands into the next tick', async () => {
    let drained = false;
    const observers = new ObserverRegistry<{ agent: SimulationObserver }>().register('agent', {
      tag: 'agent',
      onTick: () => undefined,
      drainCommands() {
        if (drained) return [];
        drained = true;
        return [command('cmd:agent', 'unequal-exchange')];
      },
    });
    const sim = new Simulation({ initialState: loadScenario('imperial-circuit'), config: QUIET, observers, logger: silentLogger });
    sim.enqueueCommand(command('cmd:direct', 'wage-labor'));

    const first = await sim.step();
    const second = await sim.step();

    const applied = (events: typeof first.events) =>
      events.flatMap(e => (e.kind === 'command_applied' ? [e.payload.commandId] : []));
    expect(applied(first.events)).toEqual(['cmd:direct']);
    expect(applied(second.events)).toEqual(['cmd:agent']);
    expect(sim.state.contradictions['unequal-exchange#g1'].parentId).toBe('unequal-exchange');
    expect(sim.state.commands).toEqual([]);
  });

  it('publishes every event to bus subscribers and isolates a failing one', async () => {
    const logger = recordingLogger();
    const sim = new Simulation({ initialState: loadScenario('two-node'), logger });
    const amounts: number[] = [];
    sim.bus.on('surplus_extraction', e => amounts.push(e.payload.amount));
    sim.bus.onAny(() => {
      throw new Error('nope');
    });

    await sim.step();

    expect(amounts).toEqual([80]);
    expect(logger.lines[0]).toEqual({ level: 'error', message: '[event-bus] consumer failed on evt:1:0 (surplus_extraction): nope' });
  });

  it('logs diagnostics when asked to', async () => {
    const overdraw: SimSystem = {
      name: 'solidarity',
      run(state) {
        const w = cloneWorld(state);
        w.entities.x.wealth = -5;
        return { state: w, events: [] };
      },
    };
    const logger = recordingLogger();
    const initialState: WorldState = createWorld({ entities: [makeSocialClass({ id: 'x', role: SocialRole.PeripheryProletariat })] });
    const sim = new Simulation({
      initialState,
      config: loadConfig({ engine: { logDiagnostics: true } }),
      systems: [overdraw],
      logger,
    });

    await sim.step();

    expect(logger.lines).toEqual([{ level: 'warn', message: '[engine] tick 1 solidarity: NUMERIC_DOMAIN x.wealth out of domain: -5 -> 0' }]);
  });
});
