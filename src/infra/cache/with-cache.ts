/**
 * Read-through caching for fetch functions that return a Result.
 */

import { ok, type Result } from 'neverthrow';

import type { CacheSetOptions, SilentCachePort } from './ports.js';

export interface WithCacheOptions<TArgs extends unknown[]> {
  /** TTL in milliseconds; adapter default when omitted */
  ttlMs?: number;
  /** Builds the cache key from the call arguments */
  keyGenerator: (args: TArgs) => string;
}

/**
 * Wrap a Result-returning function with a read-through cache.
 * Only successful results are stored, so a transient failure is retried
 * on the next call instead of being remembered.
 *
 * @example
 * ```typescript
 * const cachedFetch = withCacheResult(repo.fetchRegistry, cache, {
 *   ttlMs: 3_600_000,
 *   keyGenerator: ([period]) => keyBuilder.fromQuery(CacheNamespace.IFDATA, { subject: period }),
 * });
 * ```
 */
export const withCacheResult = <TArgs extends unknown[], TValue, TError>(
  fn: (...args: TArgs) => Promise<Result<TValue, TError>>,
  cache: SilentCachePort,
  options: WithCacheOptions<TArgs>
): ((...args: TArgs) => Promise<Result<TValue, TError>>) => {
  const { ttlMs, keyGenerator } = options;
  const setOptions: CacheSetOptions | undefined = ttlMs !== undefined ? { ttlMs } : undefined;

  return async (...args: TArgs): Promise<Result<TValue, TError>> => {
    const key = keyGenerator(args);

    const cached = await cache.get(key);
    if (cached !== undefined) {
      // Entries under a key are only ever written from this function's results
      return ok(cached as TValue);
    }

    const result = await fn(...args);
    if (result.isOk()) {
      await cache.set(key, result.value, setOptions);
    }

    return result;
  };
};
