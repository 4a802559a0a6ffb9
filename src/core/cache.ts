/**
 * TTL cache for resolver answers
 */

import { LRUCache } from 'lru-cache';
import type { CacheEntry } from './types.js';

/**
 * LRU cache keyed by lookup, with in-flight sharing: concurrent
 * `getOrSet` calls for one key run the factory once.
 */
export class CacheManager<T> {
  private store: LRUCache<string, CacheEntry<T>>;
  private pending = new Map<string, Promise<T>>();
  private lifetime: number;

  /**
   * @param maxSize Maximum number of entries
   * @param ttl Time-to-live in milliseconds
   */
  constructor(maxSize = 1000, ttl = 300000) {
    this.lifetime = ttl;
    this.store = new LRUCache<string, CacheEntry<T>>({ max: maxSize, ttl });
  }

  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (entry === undefined) return undefined;

    // per-entry TTL may be shorter than the store-wide one
    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T, ttl = this.lifetime): void {
    this.store.set(key, { value, expiresAt: Date.now() + ttl }, { ttl });
  }

  clear(): void {
    this.store.clear();
    this.pending.clear();
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Cached value, or the factory's result. A rejected factory caches
   * nothing and every caller waiting on it sees the rejection.
   */
  getOrSet(key: string, factory: () => Promise<T>, ttl?: number): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const lookup = factory()
      .then((value) => {
        this.set(key, value, ttl);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, lookup);
    return lookup;
  }
}
