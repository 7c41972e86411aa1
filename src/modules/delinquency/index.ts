/**
 * Delinquency Module Public API
 *
 * Non-performing loan rates by region and state, for individuals (PF) and
 * companies (PJ).
 */

// ============================================================================
// Types
// ============================================================================

export {
  DelinquencyCatalogFileSchema,
  DELINQUENCY_MODES,
  type DelinquencyCatalog,
  type DelinquencyCatalogFile,
  type RegionDefinition,
  type StateDefinition,
  type DelinquencyMode,
  type Location,
  type ModeValues,
  type StateDelinquency,
  type RegionDelinquency,
  type DelinquencyMap,
  type RegionSeries,
  type RegionalSeries,
  type StateComparison,
  type DownloadScope,
} from './core/types.js';

export type { DelinquencyError, UnknownStateError } from './core/errors.js';
export { createUnknownStateError } from './core/errors.js';

export type { DelinquencyRepository } from './core/ports.js';

// ============================================================================
// Pure logic
// ============================================================================

export {
  buildDelinquencyCatalog,
  allStates,
  findStateRegion,
  sgsCodeOf,
} from './core/catalog.js';
export {
  averageOfModes,
  buildDelinquencyMap,
  seriesWindow,
  toDownloadRows,
} from './core/logic.js';

// ============================================================================
// Use cases
// ============================================================================

export {
  getDelinquencyMap,
  type GetDelinquencyMapDeps,
} from './core/usecases/get-delinquency-map.js';
export {
  getRegionalSeries,
  type GetRegionalSeriesDeps,
} from './core/usecases/get-regional-series.js';
export {
  getStateComparison,
  type GetStateComparisonDeps,
  type GetStateComparisonInput,
} from './core/usecases/get-state-comparison.js';
export {
  downloadDelinquency,
  type DownloadDelinquencyDeps,
  type DownloadDelinquencyInput,
} from './core/usecases/download-delinquency.js';

// ============================================================================
// Shell
// ============================================================================

export {
  loadDelinquencyCatalog,
  DELINQUENCY_CATALOG_FILE,
} from './shell/catalog/delinquency-catalog.js';
export {
  makeDelinquencyRepo,
  type DelinquencyRepoDeps,
} from './shell/repo/delinquency-repo.js';
