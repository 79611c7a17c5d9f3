import { describe, expect, it, vi } from 'vitest';
import {
  REFERENCE_TTL_MS,
  TtlCache,
  UNIQUENESS_TTL_MS,
  ValidationCache
} from '../src/validationCache.js';
import type { ReferenceRecord } from '../src/types.js';

function clock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let time = start;
  return {
    now: () => time,
    advance: ms => {
      time += ms;
    }
  };
}

describe('TtlCache', () => {
  it('expires entries after their ttl', () => {
    const time = clock();
    const cache = new TtlCache<number>({ now: time.now });
    cache.set('a', 1, 100);

    time.advance(99);
    expect(cache.has('a')).toBe(true);
    time.advance(1);
    expect(cache.has('a')).toBe(false);

    const compute = vi.fn(() => 2);
    expect(cache.getOrCompute('a', compute, 100)).toBe(2);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('evicts the oldest fifth when a new key arrives at capacity', () => {
    const cache = new TtlCache<number>({ maxEntries: 10, now: () => 0 });
    for (let i = 0; i < 10; i++) {
      cache.set(`k${i}`, i, 1000);
    }
    cache.set('k10', 10, 1000);

    expect(cache.size).toBe(9);
    expect(cache.has('k0')).toBe(false);
    expect(cache.has('k1')).toBe(false);
    expect(cache.has('k2')).toBe(true);
    expect(cache.has('k10')).toBe(true);
  });

  it('moves a re-set key to the back of the eviction order', () => {
    const cache = new TtlCache<number>({ maxEntries: 10, now: () => 0 });
    for (let i = 0; i < 10; i++) {
      cache.set(`k${i}`, i, 1000);
    }
    cache.set('k0', 0, 1000);
    expect(cache.size).toBe(10);

    cache.set('k10', 10, 1000);
    expect(cache.has('k0')).toBe(true);
    expect(cache.has('k1')).toBe(false);
    expect(cache.has('k2')).toBe(false);
  });
});

describe('ValidationCache', () => {
  const record: ReferenceRecord = { serial: 'ABC123', attributes: { Model: 'M-1' }, row: 2 };

  it('uses three minutes for uniqueness and one minute for reference verdicts', () => {
    const cache = new ValidationCache();
    expect(cache.uniquenessTtlMs).toBe(UNIQUENESS_TTL_MS);
    expect(cache.uniquenessTtlMs).toBe(180_000);
    expect(cache.referenceTtlMs).toBe(REFERENCE_TTL_MS);
    expect(cache.referenceTtlMs).toBe(60_000);
  });

  it('memoizes a negative uniqueness verdict until it is invalidated', () => {
    const cache = new ValidationCache({ now: () => 0 });
    const compute = vi.fn<() => number | undefined>(() => undefined);

    expect(cache.uniqueness('ABC123', compute)).toBeUndefined();
    expect(cache.uniqueness('ABC123', compute)).toBeUndefined();
    expect(compute).toHaveBeenCalledTimes(1);

    compute.mockReturnValue(3);
    cache.invalidateUniqueness(['ABC123']);
    expect(cache.uniqueness('ABC123', compute)).toBe(3);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('expires reference verdicts before uniqueness verdicts', () => {
    const time = clock();
    const cache = new ValidationCache({ now: time.now });
    const lookup = vi.fn(() => record);
    const holder = vi.fn<() => number | undefined>(() => undefined);

    cache.reference('ABC123', lookup);
    cache.uniqueness('ABC123', holder);
    time.advance(60_000);
    expect(cache.reference('ABC123', lookup)).toEqual(record);
    cache.uniqueness('ABC123', holder);

    expect(lookup).toHaveBeenCalledTimes(2);
    expect(holder).toHaveBeenCalledTimes(1);
  });

  it('keeps uniqueness and reference verdicts for the same serial apart', () => {
    const cache = new ValidationCache({ now: () => 0 });
    expect(cache.uniqueness('ABC123', () => 4)).toBe(4);
    expect(cache.reference('ABC123', () => record)).toEqual(record);
    expect(cache.uniqueness('ABC123', () => undefined)).toBe(4);
  });

  it('clears only reference verdicts on reload', () => {
    const cache = new ValidationCache({ now: () => 0 });
    for (const serial of ['A', 'B', 'C']) {
      cache.uniqueness(serial, () => undefined);
    }
    cache.reference('A', () => undefined);
    cache.reference('B', () => record);

    expect(cache.clearReference()).toBe(2);
    expect(cache.size).toBe(3);
  });

  it('never holds more than 1000 entries across 10000 lookups', () => {
    const cache = new ValidationCache();
    let largest = 0;
    for (let i = 0; i < 10_000; i++) {
      cache.uniqueness(`S${i}`, () => undefined);
      cache.reference(`S${i}`, () => undefined);
      largest = Math.max(largest, cache.size);
    }

    expect(largest).toBe(1000);
    expect(cache.size).toBeLessThanOrEqual(1000);
  });
});
