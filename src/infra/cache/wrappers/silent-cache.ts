/**
 * Cache port that never fails.
 * A read error counts as a miss and the repository is asked instead; a write
 * error leaves the result uncached.
 */

import type { CacheError, CachePort, CacheSetOptions, SilentCachePort } from '../ports.js';
import type { Logger } from 'pino';

export interface SilentCacheOptions {
  logger: Logger;
}

export const createSilentCache = <T>(
  cache: CachePort<T>,
  options: SilentCacheOptions
): SilentCachePort<T> => {
  const { logger } = options;

  const report = (operation: 'read' | 'write', key: string, error: CacheError): void => {
    logger.warn(
      { err: error, key, operation },
      `Cache ${operation} failed (${error.type}): ${error.message}`
    );
  };

  return {
    async get(key) {
      const result = await cache.get(key);
      if (result.isErr()) {
        report('read', key, result.error);
        return undefined;
      }
      return result.value;
    },

    async set(key: string, value: T, setOptions?: CacheSetOptions) {
      const result = await cache.set(key, value, setOptions);
      if (result.isErr()) {
        report('write', key, result.error);
      }
    },

    stats() {
      return cache.stats();
    },
  };
};
