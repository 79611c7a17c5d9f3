import type { ReferenceRecord } from './types.js';

export const DEFAULT_MAX_ENTRIES = 1000;
export const DEFAULT_EVICT_FRACTION = 0.2;
export const UNIQUENESS_TTL_MS = 3 * 60 * 1000;
export const REFERENCE_TTL_MS = 60 * 1000;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface TtlCacheOptions {
  maxEntries?: number;
  evictFraction?: number;
  now?: () => number;
}

/**
 * Map-backed cache with per-entry expiry. When a new key arrives at capacity
 * the oldest `evictFraction` of entries (by insertion order) are dropped.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly evictCount: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    const fraction = options.evictFraction ?? DEFAULT_EVICT_FRACTION;
    this.evictCount = Math.max(1, Math.floor(this.maxEntries * fraction));
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && entry.expiresAt > this.now();
  }

  getOrCompute(key: string, compute: () => V, ttlMs: number): V {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt > this.now()) {
      return entry.value;
    }

    const value = compute();
    this.set(key, value, ttlMs);
    return value;
  }

  set(key: string, value: V, ttlMs: number): void {
    if (this.entries.has(key)) {
      // Re-inserting moves the key to the back of the eviction order.
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxEntries) {
      this.evictOldest();
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  deleteWhere(predicate: (key: string) => boolean): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (predicate(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOldest(): void {
    let remaining = this.evictCount;
    for (const key of this.entries.keys()) {
      if (remaining === 0) {
        break;
      }
      this.entries.delete(key);
      remaining--;
    }
  }
}

type Verdict =
  | { kind: 'uniqueness'; palletNumber: number | null }
  | { kind: 'reference'; record: ReferenceRecord | null };

export interface ValidationCacheOptions extends TtlCacheOptions {
  uniquenessTtlMs?: number;
  referenceTtlMs?: number;
}

const UNIQUENESS_PREFIX = 'uniq:';
const REFERENCE_PREFIX = 'ref:';

/**
 * Memoizes uniqueness and reference verdicts per serial. Both pools share one
 * bounded store; uniqueness entries must be invalidated whenever a serial is
 * added, reset or deleted.
 */
export class ValidationCache {
  private readonly store: TtlCache<Verdict>;
  readonly uniquenessTtlMs: number;
  readonly referenceTtlMs: number;

  constructor(options: ValidationCacheOptions = {}) {
    this.store = new TtlCache<Verdict>(options);
    this.uniquenessTtlMs = options.uniquenessTtlMs ?? UNIQUENESS_TTL_MS;
    this.referenceTtlMs = options.referenceTtlMs ?? REFERENCE_TTL_MS;
  }

  get size(): number {
    return this.store.size;
  }

  uniqueness(serial: string, compute: () => number | undefined): number | undefined {
    const verdict = this.store.getOrCompute(
      UNIQUENESS_PREFIX + serial,
      () => ({ kind: 'uniqueness', palletNumber: compute() ?? null }),
      this.uniquenessTtlMs
    );
    return verdict.kind === 'uniqueness' && verdict.palletNumber !== null ? verdict.palletNumber : undefined;
  }

  reference(serial: string, compute: () => ReferenceRecord | undefined): ReferenceRecord | undefined {
    const verdict = this.store.getOrCompute(
      REFERENCE_PREFIX + serial,
      () => ({ kind: 'reference', record: compute() ?? null }),
      this.referenceTtlMs
    );
    return verdict.kind === 'reference' && verdict.record !== null ? verdict.record : undefined;
  }

  invalidateUniqueness(serials: Iterable<string>): void {
    for (const serial of serials) {
      this.store.delete(UNIQUENESS_PREFIX + serial);
    }
  }

  clearReference(): number {
    return this.store.deleteWhere(key => key.startsWith(REFERENCE_PREFIX));
  }

  clear(): void {
    this.store.clear();
  }
}
