/**
 * CacheStore - generic in-memory LRU cache with per-entry TTL.
 *
 * The backing Map is kept in access order (least recently used first), so
 * eviction takes the first key. Expired entries are dropped lazily on lookup
 * and swept before an eviction; no timers are used.
 *
 * Every method is synchronous. Under the Node.js event loop a call runs to
 * completion before any other caller's, so the map and the counters are only
 * ever mutated by one caller at a time, and an entry is fully built before it
 * is stored.
 */
import type { CacheEntry, CacheStoreOptions, CacheStoreStats } from './types.js';
import { DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_MS } from './types.js';

export class CacheStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxSize: number;
  private readonly defaultTtlMs: number;
  private readonly now: () => number;

  private hits = 0;
  private misses = 0;
  private expired = 0;
  private evictions = 0;

  constructor(options: CacheStoreOptions = {}) {
    const maxSize = options.maxSize ?? DEFAULT_CACHE_MAX_SIZE;
    const defaultTtlMs = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Cache maxSize must be a positive integer, got ${maxSize}`);
    }
    if (!(defaultTtlMs > 0)) {
      throw new RangeError(`Cache default TTL must be positive, got ${defaultTtlMs}`);
    }
    this.maxSize = maxSize;
    this.defaultTtlMs = defaultTtlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Look up a value. Misses on absent or expired keys; a hit becomes the
   * most recently used entry.
   */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    const now = this.now();
    if (this.isExpired(entry, now)) {
      this.entries.delete(key);
      this.expired++;
      this.misses++;
      return undefined;
    }

    this.hits++;
    entry.lastAccessedAt = now;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  /**
   * Insert or overwrite a value.
   * @param ttlMs Lifetime in ms; null stores an entry that never expires
   */
  put(key: string, value: T, ttlMs: number | null = this.defaultTtlMs): void {
    const now = this.now();

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      this.sweep();
      if (this.entries.size >= this.maxSize) {
        this.evictLeastRecentlyUsed();
      }
    }

    const entry: CacheEntry<T> = {
      key,
      value,
      createdAt: now,
      expiresAt: ttlMs === null ? null : now + ttlMs,
      lastAccessedAt: now,
    };
    this.entries.set(key, entry);
  }

  /**
   * Check for a live entry without counting an access or touching recency.
   */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, this.now());
  }

  /**
   * Live keys, least recently used first.
   */
  keys(): string[] {
    const now = this.now();
    return [...this.entries.values()]
      .filter((entry) => !this.isExpired(entry, now))
      .map((entry) => entry.key);
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Remove every entry whose key matches the predicate.
   * @returns Number of entries removed
   */
  invalidateWhere(predicate: (key: string) => boolean): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (predicate(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Drop all expired entries.
   * @returns Number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.expired += removed;
    return removed;
  }

  /**
   * Remove all entries and reset the lifetime counters.
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.expired = 0;
    this.evictions = 0;
  }

  stats(): CacheStoreStats {
    this.sweep();
    const totalAccesses = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hitRate: totalAccesses === 0 ? 0 : this.hits / totalAccesses,
      totalAccesses,
      expiredItems: this.expired,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private isExpired(entry: CacheEntry<T>, now: number): boolean {
    return entry.expiresAt !== null && now > entry.expiresAt;
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}
