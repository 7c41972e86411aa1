/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Open-data APIs
  BCB_ODATA_BASE_URL: Type.String({ minLength: 1 }),
  BCB_SGS_BASE_URL: Type.String({ minLength: 1 }),
  BCB_REQUEST_TIMEOUT_MS: Type.Integer({ minimum: 1 }),

  // Cache
  CACHE_BACKEND: Type.Union([Type.Literal('memory'), Type.Literal('disabled')]),
  CACHE_DEFAULT_TTL_MS: Type.Integer({ minimum: 0 }),
  CACHE_MEMORY_MAX_ENTRIES: Type.Integer({ minimum: 1 }),

  // Catalog files (variables, modalities, series, regions)
  CATALOG_DIR: Type.String({ minLength: 1 }),

  // Presentation
  RANKING_TOP_N: Type.Integer({ minimum: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const DEFAULT_ODATA_BASE_URL = 'https://olinda.bcb.gov.br/olinda/servico';
const DEFAULT_SGS_BASE_URL = 'https://api.bcb.gov.br/dados/serie';

/**
 * Parses an integer variable, keeping the raw string when it is not numeric
 * so that schema validation reports it.
 */
const parseIntVar = (value: string | undefined, defaultValue: number): number | string => {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    BCB_ODATA_BASE_URL: env['BCB_ODATA_BASE_URL'] ?? DEFAULT_ODATA_BASE_URL,
    BCB_SGS_BASE_URL: env['BCB_SGS_BASE_URL'] ?? DEFAULT_SGS_BASE_URL,
    BCB_REQUEST_TIMEOUT_MS: parseIntVar(env['BCB_REQUEST_TIMEOUT_MS'], 30_000),
    CACHE_BACKEND: (env['CACHE_BACKEND'] ?? 'memory').toLowerCase(),
    // One hour, matching how long the dashboard keeps an API answer
    CACHE_DEFAULT_TTL_MS: parseIntVar(env['CACHE_DEFAULT_TTL_MS'], 3_600_000),
    CACHE_MEMORY_MAX_ENTRIES: parseIntVar(env['CACHE_MEMORY_MAX_ENTRIES'], 1000),
    CATALOG_DIR: env['CATALOG_DIR'] ?? 'catalogs',
    RANKING_TOP_N: parseIntVar(env['RANKING_TOP_N'], 10),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  runtime: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  bcb: {
    odataBaseUrl: env.BCB_ODATA_BASE_URL.replace(/\/+$/, ''),
    sgsBaseUrl: env.BCB_SGS_BASE_URL.replace(/\/+$/, ''),
    timeoutMs: env.BCB_REQUEST_TIMEOUT_MS,
  },
  cache: {
    backend: env.CACHE_BACKEND,
    defaultTtlMs: env.CACHE_DEFAULT_TTL_MS,
    memoryMaxEntries: env.CACHE_MEMORY_MAX_ENTRIES,
  },
  catalogs: {
    dir: env.CATALOG_DIR,
  },
  ranking: {
    topN: env.RANKING_TOP_N,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
