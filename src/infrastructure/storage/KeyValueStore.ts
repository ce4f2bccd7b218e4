/**
 * @fileoverview Key-value storage for local data sources
 */

import { CacheManager } from '../cache';

/**
 * String key-value storage. Local data sources store models here as JSON
 * text and throw {@link CacheException} when it fails.
 */
export interface IKeyValueStore {
  get(key: string): Promise<string | undefined>;

  /**
   * @param ttlMs - expire the entry after this many milliseconds
   */
  set(key: string, value: string, ttlMs?: number): Promise<void>;

  delete(key: string): Promise<boolean>;

  clear(): Promise<void>;
}

export interface MemoryKeyValueStoreOptions {
  /** Maximum entries before the least recently used is evicted (default: 1000) */
  capacity?: number;

  /** Applied when `set` is called without a TTL */
  defaultTtlMs?: number;
}

/**
 * In-process store backed by {@link CacheManager}.
 */
export class MemoryKeyValueStore implements IKeyValueStore {
  private readonly cache: CacheManager<string, string>;
  private readonly defaultTtlMs?: number;

  constructor(options: MemoryKeyValueStoreOptions = {}) {
    this.cache = new CacheManager(options.capacity ?? 1000);
    this.defaultTtlMs = options.defaultTtlMs;
  }

  async get(key: string): Promise<string | undefined> {
    return this.cache.get(key);
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.cache.set(key, value, ttlMs ?? this.defaultTtlMs);
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
