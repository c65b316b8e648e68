// lib/engine/history.ts
// Bounded tick history. Pinned entries survive eviction.

export class HistoryBuffer<T extends { tick: number }> {
  private entries: T[] = [];
  private readonly pinned = new Set<number>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`[history] capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(entry: T): void {
    this.entries.push(entry);
    while (this.entries.length > this.capacity) {
      const idx = this.entries.findIndex((e, i) => i < this.entries.length - 1 && !this.pinned.has(e.tick));
      // everything older is pinned: grow past capacity rather than drop a pinned tick
      if (idx < 0) break;
      this.entries.splice(idx, 1);
    }
  }

  get(tick: number): T | undefined {
    return this.entries.find(e => e.tick === tick);
  }

  latest(): T | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Returns false when the tick is no longer (or never was) held. */
  pin(tick: number): boolean {
    if (!this.get(tick)) return false;
    this.pinned.add(tick);
    return true;
  }

  unpin(tick: number): void {
    this.pinned.delete(tick);
  }

  isPinned(tick: number): boolean {
    return this.pinned.has(tick);
  }

  /** Drop every entry after `tick`. */
  truncateAfter(tick: number): void {
    this.entries = this.entries.filter(e => e.tick <= tick);
    for (const t of [...this.pinned]) if (t > tick) this.pinned.delete(t);
  }

  ticks(): number[] {
    return this.entries.map(e => e.tick);
  }

  toArray(): readonly T[] {
    return this.entries.slice();
  }

  get size(): number {
    return this.entries.length;
  }
}
