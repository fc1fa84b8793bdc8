import { describe, it, expect } from 'vitest';
import { TtlCache } from '../src/cache.js';

describe('TtlCache', () => {
  it('returns values until they expire', () => {
    let now = 1_000;
    const cache = new TtlCache({ now: () => now });

    cache.set('k', { v: 1 }, 10);
    expect(cache.get('k')).toEqual({ v: 1 });

    now += 10_001;
    expect(cache.get('k')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('ignores writes with a non-positive ttl', () => {
    const cache = new TtlCache();
    cache.set('k', 'v', 0);
    expect(cache.get('k')).toBeUndefined();
  });

  it('sweeps expired entries once past capacity', () => {
    let now = 0;
    const cache = new TtlCache({ maxEntries: 2, now: () => now });

    cache.set('a', 1, 1);
    cache.set('b', 2, 1);
    now = 5_000;
    cache.set('c', 3, 60);

    expect(cache.size).toBe(1);
    expect(cache.get('c')).toBe(3);
  });

  it('clear empties the cache', () => {
    const cache = new TtlCache();
    cache.set('a', 1, 60);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
