import { createHash } from "node:crypto";

export interface QueryCacheOptions {
  capacity: number;
  ttlMs: number;
  now?: () => number;
}

export interface QueryCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  hitRate: number;
  evictions: number;
  expirations: number;
}

interface CacheEntry<V> {
  value: V;
  insertedAt: number;
}

const stable = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(stable);
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, stable(entry)]),
    );
  }
  return value;
};

/** Same key for structurally equal values regardless of property order. */
export const cacheKeyFor = (value: unknown): string =>
  createHash("sha256").update(JSON.stringify(stable(value))).digest("hex");

/**
 * In-process LRU with TTL. Map iteration order is insertion order, so the
 * first key is always the least recently used one. Expiry is checked on
 * access; there is no background sweep.
 */
export class QueryCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: QueryCacheOptions) {
    this.capacity = Math.max(1, Math.floor(options.capacity));
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.now() - entry.insertedAt >= this.ttlMs) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  set(key: string, value: V): void {
    if (this.ttlMs <= 0) return;
    this.entries.delete(key);
    this.entries.set(key, { value, insertedAt: this.now() });
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  getOrCompute(key: string, compute: () => V): V {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = compute();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): QueryCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      hitRate: total === 0 ? 0 : this.hits / total,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }
}
