/**
 * Cache key generation with namespaces for targeted invalidation.
 */

import { createHash } from 'node:crypto';

export const CacheNamespace = {
  /** IF.Data registry and report values */
  IFDATA: 'bcb:ifdata',
  /** Credit interest rates per modality */
  INTEREST_RATES: 'bcb:interest-rates',
  /** Annual market expectations */
  EXPECTATIONS: 'bcb:expectations',
  /** SGS time series */
  SGS: 'bcb:sgs',
  /** Regional non-performing loans */
  DELINQUENCY: 'bcb:delinquency',
  /** Settled Pix transactions */
  PIX: 'bcb:pix',
} as const;

export type CacheNamespace = (typeof CacheNamespace)[keyof typeof CacheNamespace];

/**
 * What identifies a cached fetch: the entity or location asked for,
 * the fetch mode, and the date range.
 */
export interface CacheQuery {
  subject: string | number;
  mode?: string | number | undefined;
  range?: { start: string; end: string } | undefined;
  [extra: string]: unknown;
}

export interface KeyBuilder {
  /** Format: `{globalPrefix}:{namespace}:{identifier}` */
  build(namespace: CacheNamespace, identifier: string): string;

  /** Deterministic key for a query, independent of property order */
  fromQuery(namespace: CacheNamespace, query: CacheQuery): string;

  /** Format: `{globalPrefix}:{namespace}:` */
  getPrefix(namespace: CacheNamespace): string;
}

const sortObjectKeys = (value: unknown): unknown => {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sortObjectKeys);
  }

  const source = value as Record<string, unknown>;
  const result: Record<string, unknown> = {};
  for (const key of Object.keys(source).sort()) {
    if (source[key] !== undefined) {
      result[key] = sortObjectKeys(source[key]);
    }
  }
  return result;
};

/**
 * SHA-256 of the key-sorted query, truncated to 16 hex characters.
 */
const hashQuery = (query: CacheQuery): string =>
  createHash('sha256')
    .update(JSON.stringify(sortObjectKeys(query)))
    .digest('hex')
    .substring(0, 16);

export interface KeyBuilderOptions {
  /** Defaults to 'bcb-analytics' */
  globalPrefix?: string;
}

export const createKeyBuilder = (options: KeyBuilderOptions = {}): KeyBuilder => {
  const globalPrefix = options.globalPrefix ?? 'bcb-analytics';

  return {
    build(namespace, identifier) {
      return `${globalPrefix}:${namespace}:${identifier}`;
    },

    fromQuery(namespace, query) {
      return `${globalPrefix}:${namespace}:${hashQuery(query)}`;
    },

    getPrefix(namespace) {
      return `${globalPrefix}:${namespace}:`;
    },
  };
};
