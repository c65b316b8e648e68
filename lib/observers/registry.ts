// lib/observers/registry.ts
// Observers keyed by tag. Lookups are typed by the map the registry was declared with.

import type { ObserverMap, SimulationObserver } from './types';

export class ObserverRegistry<M extends ObserverMap = ObserverMap> {
  private readonly byTag: Partial<M> = {};
  private readonly order: SimulationObserver[] = [];

  register<K extends keyof M & string>(tag: K, observer: M[K]): this {
    if (observer.tag !== tag) {
      throw new Error(`[observers] tag mismatch: registered as "${tag}", observer says "${observer.tag}"`);
    }
    if (this.byTag[tag] !== undefined) throw new Error(`[observers] duplicate tag "${tag}"`);
    this.byTag[tag] = observer;
    this.order.push(observer);
    return this;
  }

  get<K extends keyof M & string>(tag: K): M[K] | undefined {
    return this.byTag[tag];
  }

  require<K extends keyof M & string>(tag: K): M[K] {
    const observer = this.byTag[tag];
    if (observer === undefined) throw new Error(`[observers] no observer registered as "${tag}"`);
    return observer;
  }

  /** Registration order; the simulation notifies in this order. */
  list(): readonly SimulationObserver[] {
    return this.order.slice();
  }

  get size(): number {
    return this.order.length;
  }
}
