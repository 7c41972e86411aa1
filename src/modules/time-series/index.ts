/**
 * Time Series Module Public API
 *
 * SGS series catalog search, combined charts over several series and their
 * descriptive statistics.
 */

// ============================================================================
// Core Types
// ============================================================================

export {
  SeriesCatalogFileSchema,
  SeriesDefinitionSchema,
  type SeriesCatalog,
  type SeriesCatalogFile,
  type SeriesCategory,
  type SeriesDefinition,
  type SeriesSelection,
  type SeriesWarning,
  type CombinedSeries,
  type CombinedSeriesInput,
  type SeriesDescription,
  type CorrelationMatrix,
} from './core/types.js';

// ============================================================================
// Errors
// ============================================================================

export type {
  TimeSeriesError,
  NoSeriesSelectedError,
  InvalidDateRangeError,
  UnknownColumnError,
} from './core/errors.js';
export {
  createNoSeriesSelectedError,
  createInvalidDateRangeError,
  createUnknownColumnError,
} from './core/errors.js';

// ============================================================================
// Logic
// ============================================================================

export { buildSeriesCatalog } from './core/catalog.js';
export {
  searchCatalog,
  parseSeriesCodes,
  selectionsForCodes,
  seriesColumnName,
  detectMixedFrequencies,
  rangeDays,
  seriesWarnings,
  describeSeries,
  correlationMatrix,
  trendBetween,
  MIN_SEARCH_LENGTH,
  LONG_RANGE_DAYS,
  CHART_SERIES_LIMIT,
} from './core/logic.js';

// ============================================================================
// Ports & Use Cases
// ============================================================================

export type { SeriesSource } from './core/ports.js';
export {
  getCombinedSeries,
  type GetCombinedSeriesDeps,
} from './core/usecases/get-combined-series.js';

// ============================================================================
// Shell
// ============================================================================

export { loadSeriesCatalog, SERIES_CATALOG_FILE } from './shell/catalog/series-catalog.js';
