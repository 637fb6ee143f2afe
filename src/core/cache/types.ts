/**
 * Types for the in-memory LRU+TTL cache.
 */

/**
 * One cached value with its bookkeeping timestamps (epoch ms).
 */
export interface CacheEntry<T> {
  key: string;
  value: T;
  createdAt: number;
  /** null means the entry never expires */
  expiresAt: number | null;
  lastAccessedAt: number;
}

export interface CacheStoreOptions {
  /** Maximum number of entries (default: 100) */
  maxSize?: number;
  /** TTL applied by put() when none is given, in ms (default: one hour) */
  defaultTtlMs?: number;
  /** Clock in epoch ms; injectable for tests */
  now?: () => number;
}

/**
 * Cache statistics. Counters cover the store's lifetime and reset on clear().
 */
export interface CacheStoreStats {
  /** Current number of entries */
  size: number;
  maxSize: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
  /** Number of get() calls */
  totalAccesses: number;
  /** Entries removed because their TTL had passed */
  expiredItems: number;
  hits: number;
  misses: number;
  /** Entries removed to make room for new keys */
  evictions: number;
}

export const DEFAULT_CACHE_MAX_SIZE = 100;
export const DEFAULT_CACHE_TTL_MS = 3_600_000;
