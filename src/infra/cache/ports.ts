/**
 * Cache port interfaces using Result pattern for explicit error handling.
 */

import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheError =
  | { type: 'SerializationError'; message: string; cause?: unknown }
  | { type: 'StorageError'; message: string; cause?: unknown };

export const CacheError = {
  serialization: (message: string, cause?: unknown): CacheError => ({
    type: 'SerializationError',
    message,
    cause,
  }),
  storage: (message: string, cause?: unknown): CacheError => ({
    type: 'StorageError',
    message,
    cause,
  }),
} as const;

export interface CacheSetOptions {
  /** TTL in milliseconds. If undefined, uses adapter default. */
  ttlMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Low-level cache interface implemented by the backends.
 */
export interface CachePort<T = unknown> {
  /** Ok(undefined) on a miss or an expired entry */
  get(key: string): Promise<Result<T | undefined, CacheError>>;

  set(key: string, value: T, options?: CacheSetOptions): Promise<Result<void, CacheError>>;

  /** Ok(true) if the key existed */
  delete(key: string): Promise<Result<boolean, CacheError>>;

  /** Drop every key starting with the prefix (namespace invalidation) */
  clearByPrefix(prefix: string): Promise<Result<number, CacheError>>;

  clear(): Promise<Result<void, CacheError>>;

  stats(): Promise<CacheStats>;
}

/**
 * Application-level cache. Failures are logged and read as misses;
 * callers never see a cache error and never own an entry exclusively.
 */
export interface SilentCachePort<T = unknown> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, options?: CacheSetOptions): Promise<void>;
  stats(): Promise<CacheStats>;
}
