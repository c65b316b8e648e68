// lib/events/bus.ts
// Fan-out of flushed tick logs to external consumers (presentation, narrative).

import { isEventOf } from './types';
import type { EventKind, EventOf, SimEvent } from './types';
import type { SimLogger } from '../diagnostics/logger';
import { describeError } from '../diagnostics/errors';

type Handler = (event: SimEvent) => void;

export class EventBus {
  private readonly byKind = new Map<EventKind, Set<Handler>>();
  private readonly any = new Set<Handler>();

  constructor(private readonly logger: SimLogger) {}

  on<K extends EventKind>(kind: K, handler: (event: EventOf<K>) => void): () => void {
    const wrapped: Handler = event => {
      if (isEventOf(event, kind)) handler(event);
    };
    const set = this.byKind.get(kind) ?? new Set<Handler>();
    set.add(wrapped);
    this.byKind.set(kind, set);
    return () => {
      set.delete(wrapped);
    };
  }

  onAny(handler: Handler): () => void {
    this.any.add(handler);
    return () => {
      this.any.delete(handler);
    };
  }

  /** Called by the loop with a sealed log; a throwing consumer never stops the others. */
  publish(events: readonly SimEvent[]): void {
    for (const event of events) {
      const handlers = [...(this.byKind.get(event.kind) ?? []), ...this.any];
      for (const h of handlers) {
        try {
          h(event);
        } catch (err) {
          this.logger.error(`[event-bus] consumer failed on ${event.id} (${event.kind}): ${describeError(err)}`);
        }
      }
    }
  }
}
