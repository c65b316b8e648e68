import { describe, expect, it } from 'vitest';

import { HistoryBuffer } from '@/lib/engine/history';

const at = (tick: number) => ({ tick });

describe('HistoryBuffer', () => {
  it('evicts the oldest unpinned entry', () => {
    const h = new HistoryBuffer<{ tick: number }>(3);
    h.push(at(0));
    h.push(at(1));
    expect(h.pin(1)).toBe(true);
    for (const t of [2, 3, 4, 5]) h.push(at(t));
    expect(h.ticks()).toEqual([1, 4, 5]);

    h.unpin(1);
    h.push(at(6));
    expect(h.ticks()).toEqual([4, 5, 6]);
    expect(h.get(1)).toBeUndefined();
    expect(h.pin(1)).toBe(false);
  });

  it('grows past capacity rather than drop a pinned entry', () => {
    const h = new HistoryBuffer<{ tick: number }>(1);
    h.push(at(0));
    h.pin(0);
    h.push(at(1));
    expect(h.size).toBe(2);
    expect(h.latest()).toEqual(at(1));
  });

  it('truncates everything after a tick and forgets their pins', () => {
    const h = new HistoryBuffer<{ tick: number }>(10);
    for (const t of [0, 1, 2, 3]) h.push(at(t));
    h.pin(3);
    h.truncateAfter(1);
    expect(h.ticks()).toEqual([0, 1]);
    expect(h.isPinned(3)).toBe(false);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new HistoryBuffer(0)).toThrow('[history] capacity must be a positive integer, got 0');
  });
});
