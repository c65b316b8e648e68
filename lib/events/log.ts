// lib/events/log.ts
// Per-tick ordered event log. Sealed once the pipeline finishes.

import { deepFreeze } from '../util/freeze';
import type { EventDraft, SimEvent } from './types';

/** Freezes the draft, payload included, and gives it its place in the tick's order. */
export function stampEvent(draft: EventDraft, tick: number, sequence: number, system: string): SimEvent {
  deepFreeze(draft.payload);
  return Object.freeze({
    ...draft,
    id: `evt:${tick}:${sequence}`,
    tick,
    sequence,
    system,
  });
}

export class TickEventLog {
  private readonly events: SimEvent[] = [];
  private sealed = false;

  constructor(readonly tick: number) {}

  append(system: string, drafts: readonly EventDraft[]): void {
    if (this.sealed) throw new Error(`[events] log for tick ${this.tick} is sealed`);
    for (const draft of drafts) this.events.push(stampEvent(draft, this.tick, this.events.length, system));
  }

  get size(): number {
    return this.events.length;
  }

  seal(): readonly SimEvent[] {
    this.sealed = true;
    return Object.freeze(this.events.slice());
  }
}
