// lib/engine/simulation.ts
// Simulation loop: step/run/rollback over committed ticks, observers notified after each commit.

import type { EndgameOutcome } from '../../enums';
import type { WorldCommand, WorldState } from '../../types';
import { DEFAULT_CONFIG } from '../config/load';
import type { SimulationConfig } from '../config/schema';
import { RandomStream } from '../core/noise';
import { ObserverError } from '../diagnostics/errors';
import type { SimLogger } from '../diagnostics/logger';
import { consoleLogger } from '../diagnostics/logger';
import { EndgameDetector } from '../endgame/EndgameDetector';
import type { EndgameMemory } from '../endgame/EndgameDetector';
import { EventBus } from '../events/bus';
import { stampEvent } from '../events/log';
import type { SimEvent } from '../events/types';
import { cloneWorld, freezeWorld } from '../model/world';
import { ObserverRegistry } from '../observers/registry';
import type { ObserverMap, SimulationObserver } from '../observers/types';
import type { SimSystem } from '../systems/types';
import { HistoryBuffer } from './history';
import { runTick } from './tick';

export interface TickRecord {
  tick: number;
  state: WorldState;
  events: readonly SimEvent[];
  observerErrors: ObserverError[];
  endgame: EndgameMemory;
}

export type StopReason = 'endgame' | 'max_ticks' | 'aborted';

export interface RunSummary {
  ticks: number;
  stoppedBy: StopReason;
  outcome: EndgameOutcome | null;
  state: WorldState;
}

export interface SimulationOptions<M extends ObserverMap> {
  initialState: WorldState;
  config?: SimulationConfig;
  observers?: ObserverRegistry<M>;
  logger?: SimLogger;
  systems?: readonly SimSystem[];
}

export interface RunOptions {
  /** Ticks to run in this call; defaults to engine.maxTicks. */
  maxTicks?: number;
  /** Checked between ticks only. */
  signal?: AbortSignal;
}

export class Simulation<M extends ObserverMap = ObserverMap> {
  readonly config: SimulationConfig;
  readonly observers: ObserverRegistry<M>;
  readonly bus: EventBus;
  readonly history: HistoryBuffer<TickRecord>;

  private readonly logger: SimLogger;
  private readonly systems: readonly SimSystem[] | undefined;
  private readonly rng: RandomStream;
  private readonly detector: EndgameDetector;
  private current: WorldState;
  private pending: WorldCommand[] = [];
  private started = false;
  private ended = false;
  /** Tail of the step queue; a step begins only after the previous one settled. */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: SimulationOptions<M>) {
    this.config = opts.config ?? DEFAULT_CONFIG;
    this.observers = opts.observers ?? new ObserverRegistry<M>();
    this.logger = opts.logger ?? consoleLogger;
    this.systems = opts.systems;
    this.bus = new EventBus(this.logger);
    this.rng = new RandomStream(this.config.engine.seed);
    this.detector = new EndgameDetector(this.config.endgame);
    this.history = new HistoryBuffer<TickRecord>(this.config.engine.historyCapacity);

    this.current = freezeWorld(cloneWorld(opts.initialState));
    this.history.push({
      tick: this.current.tick,
      state: this.current,
      events: [],
      observerErrors: [],
      endgame: this.detector.snapshot(),
    });
  }

  get state(): WorldState {
    return this.current;
  }

  get tick(): number {
    return this.current.tick;
  }

  get outcome(): EndgameOutcome | null {
    return this.detector.outcome;
  }

  /** Queued for the next tick; consumed by the contradiction system. */
  enqueueCommand(cmd: WorldCommand): void {
    this.pending.push(structuredClone(cmd));
  }

  /** Overlapping calls run one after another, observers included. */
  step(): Promise<TickRecord> {
    const next = this.queue.then(() => this.advance());
    // a failed step rejects for its own caller only
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async advance(): Promise<TickRecord> {
    if (this.detector.outcome !== null) {
      throw new Error(`[engine] run already ended with ${this.detector.outcome} at tick ${this.current.tick}`);
    }
    await this.start();
    // stepping again after a tick-limit stop reopens the run
    this.ended = false;

    const before = this.current;
    const commands = this.pending;
    this.pending = [];
    const { state: after, events: tickEvents } = runTick(before, this.config, this.rng, { commands, systems: this.systems });

    const verdict = this.detector.evaluate(after);
    const events = verdict
      ? Object.freeze([...tickEvents, stampEvent({ kind: 'endgame', payload: verdict }, after.tick, tickEvents.length, 'endgame')])
      : tickEvents;

    this.current = after;
    if (this.config.engine.logDiagnostics) {
      for (const e of events) {
        if (e.kind === 'diagnostic') this.logger.warn(`[engine] tick ${e.tick} ${e.payload.system}: ${e.payload.code} ${e.payload.message}`);
      }
    }
    this.bus.publish(events);

    const observerErrors = await this.notify(before, after, events);
    for (const observer of this.observers.list()) {
      const queued = observer.drainCommands?.() ?? [];
      for (const cmd of queued) this.enqueueCommand(cmd);
    }

    const record: TickRecord = { tick: after.tick, state: after, events, observerErrors, endgame: this.detector.snapshot() };
    this.history.push(record);

    if (verdict) {
      this.logger.info(`[engine] ${verdict.outcome} at tick ${after.tick} (digest ${verdict.digest})`);
      await this.finish();
    }
    return record;
  }

  async run(opts: RunOptions = {}): Promise<RunSummary> {
    const maxTicks = opts.maxTicks ?? this.config.engine.maxTicks;
    let ticks = 0;
    for (;;) {
      if (this.detector.outcome !== null) return this.summary(ticks, 'endgame');
      if (opts.signal?.aborted) {
        this.logger.info(`[engine] stopped by signal at tick ${this.current.tick}`);
        return this.summary(ticks, 'aborted');
      }
      if (ticks >= maxTicks) {
        await this.finish();
        return this.summary(ticks, 'max_ticks');
      }
      await this.step();
      ticks++;
    }
  }

  /**
   * Restore a committed tick still held in history. Later records and queued commands
   * are discarded; observers keep their derived state.
   */
  rollbackTo(tick: number): WorldState {
    const record = this.history.get(tick);
    if (!record) throw new Error(`[engine] tick ${tick} is not in history`);
    this.history.truncateAfter(tick);
    this.current = record.state;
    this.pending = [];
    this.detector.restore(record.endgame);
    this.ended = record.endgame.outcome !== null;
    this.logger.info(`[engine] rolled back to tick ${tick}`);
    return this.current;
  }

  private summary(ticks: number, stoppedBy: StopReason): RunSummary {
    return { ticks, stoppedBy, outcome: this.detector.outcome, state: this.current };
  }

  private async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    await this.broadcast('onStart', o => o.onStart?.(this.current));
  }

  private async finish(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    const outcome = this.detector.outcome;
    await this.broadcast('onEnd', o => o.onEnd?.(this.current, outcome));
  }

  private async notify(before: WorldState, after: WorldState, events: readonly SimEvent[]): Promise<ObserverError[]> {
    const observers = this.observers.list();
    const results = await Promise.allSettled(observers.map(o => Promise.resolve().then(() => o.onTick(before, after, events))));
    const errors: ObserverError[] = [];
    results.forEach((r, i) => {
      if (r.status === 'fulfilled') return;
      const err = new ObserverError(observers[i].tag, after.tick, r.reason);
      this.logger.error(`[observer:${observers[i].tag}] ${err.message}`);
      errors.push(err);
    });
    return errors;
  }

  private async broadcast(
    hook: string,
    call: (o: SimulationObserver) => unknown,
  ): Promise<void> {
    const observers = this.observers.list();
    const results = await Promise.allSettled(observers.map(o => Promise.resolve().then(() => call(o))));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        const err = new ObserverError(observers[i].tag, this.current.tick, r.reason);
        this.logger.error(`[observer:${observers[i].tag}] ${hook}: ${err.message}`);
      }
    });
  }
}
