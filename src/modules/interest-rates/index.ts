/**
 * Interest Rates Module Public API
 *
 * Credit interest rates per modality and institution: latest snapshots,
 * rankings, bank profiles, median charts and downloads.
 */

// ============================================================================
// Core Types
// ============================================================================

export {
  InterestRateCatalogFileSchema,
  ModalityDefinitionSchema,
  type InterestRateCatalog,
  type InterestRateCatalogFile,
  type ModalityDefinition,
  type ModalityFrequency,
  type RateColumns,
  type ModalitySnapshot,
  type ModalityRanking,
  type BankRateEntry,
  type BankRateProfile,
  type MedianRateChart,
} from './core/types.js';

// ============================================================================
// Errors
// ============================================================================

export type { InterestRatesError, UnknownModalityError } from './core/errors.js';
export { createUnknownModalityError } from './core/errors.js';

// ============================================================================
// Logic
// ============================================================================

export {
  shortModalityLabel,
  rankModalityRates,
  bankRatePosition,
  collectInstitutions,
  medianRateByDate,
  filterByDateRange,
} from './core/logic.js';

export {
  buildInterestRateCatalog,
  findModality,
  rankedModalities,
  dateColumnOf,
} from './core/catalog.js';

// ============================================================================
// Ports
// ============================================================================

export type { InterestRateRepository } from './core/ports.js';

// ============================================================================
// Use Cases
// ============================================================================

export {
  loadLatestRates,
  type LoadLatestRatesDeps,
  type LoadLatestRatesInput,
} from './core/usecases/load-latest-rates.js';

export {
  getRateRankings,
  type GetRateRankingsDeps,
  type GetRateRankingsInput,
} from './core/usecases/get-rate-rankings.js';

export {
  getBankRateProfile,
  listRateInstitutions,
  type GetBankRateProfileDeps,
  type GetBankRateProfileInput,
} from './core/usecases/get-bank-rate-profile.js';

export {
  getMedianRateChart,
  DEFAULT_CHART_YEARS,
  type GetMedianRateChartDeps,
  type GetMedianRateChartInput,
} from './core/usecases/get-median-rate-chart.js';

export {
  downloadRates,
  type DownloadRatesDeps,
  type DownloadRatesInput,
} from './core/usecases/download-rates.js';

// ============================================================================
// Shell
// ============================================================================

export {
  makeInterestRateRepo,
  type InterestRateRepoDeps,
} from './shell/repo/interest-rate-repo.js';
export {
  loadInterestRateCatalog,
  INTEREST_RATE_CATALOG_FILE,
} from './shell/catalog/interest-rate-catalog.js';
