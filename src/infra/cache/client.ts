/**
 * Cache client factory - creates and configures cache instances.
 */

import { createMemoryCache, createNoopCache } from './adapters/index.js';
import { createKeyBuilder, type KeyBuilder } from './key-builder.js';
import { createSilentCache } from './wrappers/index.js';

import type { CachePort, SilentCachePort } from './ports.js';
import type { Logger } from 'pino';

export type CacheBackend = 'disabled' | 'memory';

export interface CacheConfig {
  backend: CacheBackend;
  defaultTtlMs: number;
  memoryMaxEntries: number;
}

export interface CacheClient<T = unknown> {
  /** Silent cache port for application use */
  cache: SilentCachePort<T>;
  keyBuilder: KeyBuilder;
  /** Low-level cache port (for testing/advanced use) */
  rawCache: CachePort<T>;
}

export interface InitCacheOptions {
  config: CacheConfig;
  logger: Logger;
  keyPrefix?: string;
}

export const initCache = <T = unknown>(options: InitCacheOptions): CacheClient<T> => {
  const { config, logger } = options;

  const keyBuilder = createKeyBuilder(
    options.keyPrefix !== undefined ? { globalPrefix: options.keyPrefix } : {}
  );

  let rawCache: CachePort<T>;

  switch (config.backend) {
    case 'disabled':
      logger.info('[Cache] Using NoOp cache (disabled)');
      rawCache = createNoopCache<T>();
      break;

    case 'memory':
      logger.info(
        { maxEntries: config.memoryMaxEntries, defaultTtlMs: config.defaultTtlMs },
        '[Cache] Using in-memory LRU cache'
      );
      rawCache = createMemoryCache<T>({
        maxEntries: config.memoryMaxEntries,
        defaultTtlMs: config.defaultTtlMs,
      });
      break;
  }

  return {
    cache: createSilentCache<T>(rawCache, { logger }),
    keyBuilder,
    rawCache,
  };
};
