/**
 * Cache module exports.
 */
export { CacheStore } from './store.js';
export type { CacheEntry, CacheStoreOptions, CacheStoreStats } from './types.js';
export { DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_MS } from './types.js';
