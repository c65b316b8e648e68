// lib/observers/types.ts
// Observer contract. Observers only read; world changes go back through queued commands.

import type { EndgameOutcome } from '../../enums';
import type { WorldCommand, WorldState } from '../../types';
import type { SimEvent } from '../events/types';

export type MaybePromise<T> = T | Promise<T>;

export interface SimulationObserver {
  readonly tag: string;
  onStart?(initial: WorldState): MaybePromise<void>;
  /** `before` and `after` are frozen committed snapshots; `events` is the sealed log of the tick. */
  onTick(before: WorldState, after: WorldState, events: readonly SimEvent[]): MaybePromise<void>;
  onEnd?(final: WorldState, outcome: EndgameOutcome | null): MaybePromise<void>;
  /** Commands to queue for the next tick. Called after every onTick. */
  drainCommands?(): WorldCommand[];
}

export type ObserverMap = Record<string, SimulationObserver>;
