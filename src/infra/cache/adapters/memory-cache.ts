/**
 * In-memory LRU cache with TTL expiration.
 */

import { ok } from 'neverthrow';

import { deserialize, serialize } from '../serialization.js';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

interface CacheEntry {
  /** Serialized value, so callers never share a mutable instance */
  value: string;
  /** Expiration timestamp (ms since epoch) */
  expiresAt: number;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Default TTL in milliseconds. Default: 3600000 (1 hour) */
  defaultTtlMs?: number;
  /** Clock, overridable in tests */
  now?: () => number;
}

export const createMemoryCache = <T>(options: MemoryCacheOptions = {}): CachePort<T> => {
  const maxEntries = options.maxEntries ?? 1000;
  const defaultTtlMs = options.defaultTtlMs ?? 3_600_000;
  const now = options.now ?? Date.now;

  // Map keeps insertion order: the first key is the least recently used
  const store = new Map<string, CacheEntry>();

  let hits = 0;
  let misses = 0;

  const readLive = (key: string): CacheEntry | undefined => {
    const entry = store.get(key);
    if (entry === undefined) return undefined;
    if (now() >= entry.expiresAt) {
      store.delete(key);
      return undefined;
    }
    return entry;
  };

  const evictLru = (): void => {
    const lruKey = store.keys().next().value;
    if (lruKey !== undefined) {
      store.delete(lruKey);
    }
  };

  return {
    get(key: string) {
      const entry = readLive(key);
      if (entry === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }

      const result = deserialize(entry.value);
      if (!result.ok) {
        store.delete(key);
        misses++;
        return Promise.resolve(ok(undefined));
      }

      // Re-insert to mark as most recently used
      store.delete(key);
      store.set(key, entry);

      hits++;
      return Promise.resolve(ok(result.value as T));
    },

    set(key: string, value: T, setOptions?: CacheSetOptions) {
      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;

      if (store.has(key)) {
        store.delete(key);
      } else if (store.size >= maxEntries) {
        evictLru();
      }

      store.set(key, { value: serialize(value), expiresAt: now() + ttlMs });
      return Promise.resolve(ok(undefined));
    },

    delete(key: string) {
      return Promise.resolve(ok(store.delete(key)));
    },

    clearByPrefix(prefix: string) {
      let count = 0;
      for (const key of [...store.keys()]) {
        if (key.startsWith(prefix)) {
          store.delete(key);
          count++;
        }
      }
      return Promise.resolve(ok(count));
    },

    clear() {
      store.clear();
      hits = 0;
      misses = 0;
      return Promise.resolve(ok(undefined));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits, misses, size: store.size });
    },
  };
};
