/**
 * Cache Infrastructure
 *
 * Read-through result cache with silent degradation: a cache failure is a
 * miss, never a request failure.
 *
 * @example
 * ```typescript
 * const { cache, keyBuilder } = initCache({ config: config.cache, logger });
 *
 * const fetchSeries = withCacheResult(sgsRepo.fetchSeries, cache, {
 *   ttlMs: config.cache.defaultTtlMs,
 *   keyGenerator: ([code, range]) =>
 *     keyBuilder.fromQuery(CacheNamespace.SGS, { subject: code, range }),
 * });
 * ```
 */

export type {
  CachePort,
  SilentCachePort,
  CacheError,
  CacheSetOptions,
  CacheStats,
} from './ports.js';
export { CacheError as CacheErrorFactory } from './ports.js';

export {
  CacheNamespace,
  createKeyBuilder,
  type CacheQuery,
  type KeyBuilder,
  type KeyBuilderOptions,
} from './key-builder.js';

export { serialize, deserialize } from './serialization.js';

export { createNoopCache, createMemoryCache, type MemoryCacheOptions } from './adapters/index.js';

export { createSilentCache, type SilentCacheOptions } from './wrappers/index.js';

export { withCacheResult, type WithCacheOptions } from './with-cache.js';

export {
  initCache,
  type CacheBackend,
  type CacheConfig,
  type CacheClient,
  type InitCacheOptions,
} from './client.js';
