/**
 * @fileoverview LRU cache with per-entry expiry
 *
 * Backs {@link MemoryKeyValueStore}, the in-process local data source.
 */

interface CacheEntry<V> {
  value: V;
  expiresAt?: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
}

/**
 * CacheManager - LRU cache with TTL
 *
 * @example
 * ```typescript
 * const cache = new CacheManager<string, string>(500);
 *
 * cache.set('article:42', json, 60_000);
 * const cached = cache.get('article:42');
 * ```
 */
export class CacheManager<K, V> {
  private readonly cache: Map<K, CacheEntry<V>> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity: number = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get(key: K): V | undefined {
    const entry = this.live(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.hits++;
    return entry.value;
  }

  /**
   * @param ttl - Time to live in milliseconds; omitted or 0 means no expiry
   */
  set(key: K, value: V, ttl?: number): void {
    this.cache.delete(key);

    if (this.cache.size >= this.capacity) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(key, {
      value,
      expiresAt: ttl ? Date.now() + ttl : undefined,
    });
  }

  has(key: K): boolean {
    return this.live(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  keys(): K[] {
    return Array.from(this.cache.keys());
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Drop expired entries, returning how many were removed.
   */
  prune(): number {
    let pruned = 0;
    const now = Date.now();

    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt !== undefined && now > entry.expiresAt) {
        this.cache.delete(key);
        pruned++;
      }
    }

    return pruned;
  }

  private live(key: K): CacheEntry<V> | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt !== undefined && Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry;
  }
}
