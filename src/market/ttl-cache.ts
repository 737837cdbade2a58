import { systemClock, type Clock } from "../lib/clock.js";

type CacheEntry<V> = {
  storedAt: number;
  value: V;
};

export type TtlCacheOptions = {
  ttlMs?: number;
  clock?: Clock;
};

export const DEFAULT_CACHE_TTL_MS = 60_000;

/**
 * In-process cache keyed by request. Staleness is judged on read from the
 * elapsed time since the entry was stored; stale entries are dropped then.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(options: TtlCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.clock = options.clock ?? systemClock;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.clock.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { storedAt: this.clock.now(), value });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
