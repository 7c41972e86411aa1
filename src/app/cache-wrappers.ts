/**
 * Cache wrapper factories for repository methods.
 *
 * Each wrapper returns a cached version of a port. Keys hash the query
 * (subject, mode, date range), so the same request within the TTL is
 * answered from the cache.
 */

import { formatIsoDate } from '../common/types/temporal.js';
import { CacheNamespace, withCacheResult, type KeyBuilder, type SilentCachePort } from '../infra/cache/index.js';

import type { DateRange } from '../infra/bcb/index.js';
import type { DelinquencyRepository } from '../modules/delinquency/index.js';
import type { ExpectationsRepository } from '../modules/expectations/index.js';
import type { PixRepository } from '../modules/instant-payments/index.js';
import type { IfDataRepository } from '../modules/institutions/index.js';
import type { InterestRateRepository } from '../modules/interest-rates/index.js';
import type { SeriesSource } from '../modules/time-series/index.js';

export interface CacheWrapperDeps {
  cache: SilentCachePort;
  keyBuilder: KeyBuilder;
  ttlMs: number;
}

const isoRange = (range: DateRange): { start: string; end: string } => ({
  start: formatIsoDate(range.start),
  end: formatIsoDate(range.end),
});

// ─────────────────────────────────────────────────────────────────────────────
// IF.Data
// ─────────────────────────────────────────────────────────────────────────────

export const wrapIfDataRepo = (
  repo: IfDataRepository,
  deps: CacheWrapperDeps
): IfDataRepository => {
  const { cache, keyBuilder, ttlMs } = deps;

  return {
    getRegistry: withCacheResult(repo.getRegistry.bind(repo), cache, {
      ttlMs,
      keyGenerator: ([period]) =>
        keyBuilder.fromQuery(CacheNamespace.IFDATA, { subject: period, mode: 'registry' }),
    }),
    getReport: withCacheResult(repo.getReport.bind(repo), cache, {
      ttlMs,
      keyGenerator: ([period, report]) =>
        keyBuilder.fromQuery(CacheNamespace.IFDATA, { subject: period, mode: report }),
    }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Instant payments
// ─────────────────────────────────────────────────────────────────────────────

export const wrapPixRepo = (repo: PixRepository, deps: CacheWrapperDeps): PixRepository => {
  const { cache, keyBuilder, ttlMs } = deps;

  return {
    getSettledSince: withCacheResult(repo.getSettledSince.bind(repo), cache, {
      ttlMs,
      keyGenerator: ([start]) =>
        keyBuilder.fromQuery(CacheNamespace.PIX, { subject: formatIsoDate(start) }),
    }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Interest rates
// ─────────────────────────────────────────────────────────────────────────────

export const wrapInterestRateRepo = (
  repo: InterestRateRepository,
  deps: CacheWrapperDeps
): InterestRateRepository => {
  const { cache, keyBuilder, ttlMs } = deps;

  return {
    getModalityRates: withCacheResult(repo.getModalityRates.bind(repo), cache, {
      ttlMs,
      keyGenerator: ([modality, limit]) =>
        keyBuilder.fromQuery(CacheNamespace.INTEREST_RATES, {
          subject: modality.name,
          mode: modality.frequency,
          limit,
        }),
    }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Market expectations
// ─────────────────────────────────────────────────────────────────────────────

export const wrapExpectationsRepo = (
  repo: ExpectationsRepository,
  deps: CacheWrapperDeps
): ExpectationsRepository => {
  const { cache, keyBuilder, ttlMs } = deps;

  return {
    getAnnualExpectations: withCacheResult(repo.getAnnualExpectations.bind(repo), cache, {
      ttlMs,
      keyGenerator: ([indicator, limit]) =>
        keyBuilder.fromQuery(CacheNamespace.EXPECTATIONS, { subject: indicator, limit }),
    }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// SGS series
// ─────────────────────────────────────────────────────────────────────────────

export const wrapSeriesSource = (source: SeriesSource, deps: CacheWrapperDeps): SeriesSource => {
  const { cache, keyBuilder, ttlMs } = deps;

  return {
    fetchSeries: withCacheResult(source.fetchSeries.bind(source), cache, {
      ttlMs,
      keyGenerator: ([code, range]) =>
        keyBuilder.fromQuery(CacheNamespace.SGS, { subject: code, range: isoRange(range) }),
    }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Delinquency
// ─────────────────────────────────────────────────────────────────────────────

export const wrapDelinquencyRepo = (
  repo: DelinquencyRepository,
  deps: CacheWrapperDeps
): DelinquencyRepository => {
  const { cache, keyBuilder, ttlMs } = deps;

  return {
    getLast: withCacheResult(repo.getLast.bind(repo), cache, {
      ttlMs,
      keyGenerator: ([location, mode, count]) =>
        keyBuilder.fromQuery(CacheNamespace.DELINQUENCY, {
          subject: `${location.kind}:${location.code}`,
          mode,
          last: count,
        }),
    }),
    getSeries: withCacheResult(repo.getSeries.bind(repo), cache, {
      ttlMs,
      keyGenerator: ([location, mode, range]) =>
        keyBuilder.fromQuery(CacheNamespace.DELINQUENCY, {
          subject: `${location.kind}:${location.code}`,
          mode,
          range: isoRange(range),
        }),
    }),
  };
};
