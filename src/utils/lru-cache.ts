// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Bounded in-memory LRU cache with TTL.
 */

interface CacheEntry<V> {
  value: V;
  timestamp: number;
}

export interface LRUCacheOptions {
  /** Maximum number of entries before the least recently used is evicted */
  maxSize?: number;
  /** Entries older than this are treated as missing */
  ttlMinutes?: number;
  /** Clock, replaceable in tests */
  now?: () => number;
}

export class LRUCache<V> {
  private cache = new Map<string, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: LRUCacheOptions = {}) {
    this.maxSize = Math.max(1, options.maxSize ?? 1000);
    this.ttlMs = (options.ttlMinutes ?? 60) * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.now() - entry.timestamp > this.ttlMs) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to end for LRU (delete and re-add)
    this.cache.delete(key);
    this.cache.set(key, entry);
    this.hits++;
    return entry.value;
  }

  set(key: string, value: V): void {
    this.cache.delete(key);

    while (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }

    this.cache.set(key, { value, timestamp: this.now() });
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): { size: number; maxSize: number; hits: number; misses: number } {
    return { size: this.cache.size, maxSize: this.maxSize, hits: this.hits, misses: this.misses };
  }
}
