/**
 * Core factory
 *
 * Wires configuration, logging, the open-data clients, the catalogs and the
 * cached repositories into the dependencies the use cases take.
 */

import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import {
  wrapDelinquencyRepo,
  wrapExpectationsRepo,
  wrapIfDataRepo,
  wrapInterestRateRepo,
  wrapPixRepo,
  wrapSeriesSource,
  type CacheWrapperDeps,
} from './cache-wrappers.js';
import { createODataClient, createSgsClient, type FetchFn } from '../infra/bcb/index.js';
import { initCache, type CacheClient } from '../infra/cache/index.js';
import { createConfig, parseEnv, type AppConfig } from '../infra/config/env.js';
import { componentLogger, createLogger } from '../infra/logger/index.js';
import { loadDelinquencyCatalog, makeDelinquencyRepo } from '../modules/delinquency/index.js';
import { loadExpectationsCatalog, makeExpectationsRepo } from '../modules/expectations/index.js';
import { makePixRepo } from '../modules/instant-payments/index.js';
import { loadIfDataCatalog, makeIfDataRepo } from '../modules/institutions/index.js';
import { loadInterestRateCatalog, makeInterestRateRepo } from '../modules/interest-rates/index.js';
import { loadSeriesCatalog } from '../modules/time-series/index.js';

import type { CatalogError } from '../infra/catalogs/index.js';
import type { DelinquencyCatalog, DelinquencyRepository } from '../modules/delinquency/index.js';
import type { ExpectationsCatalog, ExpectationsRepository } from '../modules/expectations/index.js';
import type { PixRepository } from '../modules/instant-payments/index.js';
import type { IfDataCatalog, IfDataRepository } from '../modules/institutions/index.js';
import type { InterestRateCatalog, InterestRateRepository } from '../modules/interest-rates/index.js';
import type { SeriesCatalog, SeriesSource } from '../modules/time-series/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BuildCoreOptions {
  /** Validated configuration; read from process.env when omitted */
  config?: AppConfig;
  logger?: Logger;
  /** HTTP transport for the OData and SGS clients */
  fetchFn?: FetchFn;
  /** Replaces the SGS-backed source of regional delinquency series */
  delinquencyRepo?: DelinquencyRepository;
}

export interface CoreCatalogs {
  ifData: IfDataCatalog;
  interestRates: InterestRateCatalog;
  expectations: ExpectationsCatalog;
  series: SeriesCatalog;
  delinquency: DelinquencyCatalog;
}

export interface CoreRepos {
  pix: PixRepository;
  ifData: IfDataRepository;
  interestRates: InterestRateRepository;
  expectations: ExpectationsRepository;
  series: SeriesSource;
  delinquency: DelinquencyRepository;
}

export interface Core {
  config: AppConfig;
  logger: Logger;
  cache: CacheClient;
  catalogs: CoreCatalogs;
  repos: CoreRepos;
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalogs
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Loads every catalog from a directory, stopping at the first invalid file.
 */
export const loadCatalogs = async (
  catalogDir: string
): Promise<Result<CoreCatalogs, CatalogError>> => {
  const [ifData, interestRates, expectations, series, delinquency] = await Promise.all([
    loadIfDataCatalog(catalogDir),
    loadInterestRateCatalog(catalogDir),
    loadExpectationsCatalog(catalogDir),
    loadSeriesCatalog(catalogDir),
    loadDelinquencyCatalog(catalogDir),
  ]);

  if (ifData.isErr()) return err(ifData.error);
  if (interestRates.isErr()) return err(interestRates.error);
  if (expectations.isErr()) return err(expectations.error);
  if (series.isErr()) return err(series.error);
  if (delinquency.isErr()) return err(delinquency.error);

  return ok({
    ifData: ifData.value,
    interestRates: interestRates.value,
    expectations: expectations.value,
    series: series.value,
    delinquency: delinquency.value,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const buildCore = async (
  options: BuildCoreOptions = {}
): Promise<Result<Core, CatalogError>> => {
  const config = options.config ?? createConfig(parseEnv(process.env));
  const logger = options.logger ?? createLogger(config.logger);

  const catalogDir = path.resolve(config.catalogs.dir);
  const catalogsResult = await loadCatalogs(catalogDir);
  if (catalogsResult.isErr()) {
    logger.error({ err: catalogsResult.error, catalogDir }, 'Failed to load catalogs');
    return err(catalogsResult.error);
  }
  const catalogs = catalogsResult.value;

  const cacheClient = initCache({ config: config.cache, logger: componentLogger(logger, 'cache') });
  const wrapperDeps: CacheWrapperDeps = {
    cache: cacheClient.cache,
    keyBuilder: cacheClient.keyBuilder,
    ttlMs: config.cache.defaultTtlMs,
  };

  const httpOptions = {
    timeoutMs: config.bcb.timeoutMs,
    ...(options.fetchFn !== undefined && { fetchFn: options.fetchFn }),
  };
  const odata = createODataClient({
    ...httpOptions,
    baseUrl: config.bcb.odataBaseUrl,
    logger: componentLogger(logger, 'odata'),
  });
  const sgs = createSgsClient({
    ...httpOptions,
    baseUrl: config.bcb.sgsBaseUrl,
    logger: componentLogger(logger, 'sgs'),
  });

  const repos: CoreRepos = {
    pix: wrapPixRepo(makePixRepo({ client: odata }), wrapperDeps),
    ifData: wrapIfDataRepo(makeIfDataRepo({ client: odata }), wrapperDeps),
    interestRates: wrapInterestRateRepo(
      makeInterestRateRepo({ client: odata, catalog: catalogs.interestRates }),
      wrapperDeps
    ),
    expectations: wrapExpectationsRepo(
      makeExpectationsRepo({ client: odata, catalog: catalogs.expectations }),
      wrapperDeps
    ),
    series: wrapSeriesSource(sgs, wrapperDeps),
    delinquency: wrapDelinquencyRepo(
      options.delinquencyRepo ?? makeDelinquencyRepo({ client: sgs, catalog: catalogs.delinquency }),
      wrapperDeps
    ),
  };

  logger.info(
    {
      catalogDir,
      cache: config.cache.backend,
      delinquency: options.delinquencyRepo !== undefined ? 'injected' : 'sgs',
    },
    'Core ready'
  );

  return ok({ config, logger, cache: cacheClient, catalogs, repos });
};
