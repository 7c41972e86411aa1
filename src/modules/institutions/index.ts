/**
 * Institutions Module Public API
 *
 * IF.Data financials of supervised institutions: registry filter, long → wide
 * merge with derived ratios, rankings, profiles and history downloads.
 */

// ============================================================================
// Core Types
// ============================================================================

export {
  IfDataCatalogFileSchema,
  VariableDefinitionSchema,
  IFDATA_REPORTS,
  type IfDataReport,
  type IfDataCatalog,
  type IfDataCatalogFile,
  type VariableDefinition,
  type SourceField,
  type RegistryEntry,
  type RegistryColumns,
  type RegistryFilter,
  type ValueColumns,
  type ValueTableInput,
  type WideTableOptions,
  type MaterialityThreshold,
  type InstitutionSnapshot,
  type VariableRanking,
  type ProfileEntry,
  type InstitutionProfile,
} from './core/types.js';

// ============================================================================
// Errors
// ============================================================================

export type {
  InstitutionsError,
  InvalidQuarterRangeError,
  InstitutionNotFoundError,
} from './core/errors.js';

export {
  createInvalidQuarterRangeError,
  createInstitutionNotFoundError,
} from './core/errors.js';

// ============================================================================
// Logic
// ============================================================================

export {
  filterRegistry,
  buildWideTable,
  applyMaterialityFilter,
  absoluteRatioPercent,
  cleanDisplayName,
} from './core/logic.js';

export {
  latestQuarterCandidates,
  quarterRange,
  toPeriod,
  splitPeriod,
  MAX_RANGE_MONTHS,
} from './core/quarters.js';

export { buildIfDataCatalog } from './core/catalog.js';

// ============================================================================
// Ports
// ============================================================================

export type { IfDataRepository } from './core/ports.js';

// ============================================================================
// Use Cases
// ============================================================================

export {
  loadLatestInstitutionTable,
  type LoadLatestInstitutionTableDeps,
  type LoadLatestInstitutionTableInput,
} from './core/usecases/load-latest-institution-table.js';

export {
  getInstitutionRankings,
  type GetInstitutionRankingsDeps,
  type GetInstitutionRankingsInput,
  type InstitutionRankings,
} from './core/usecases/get-institution-rankings.js';

export {
  getInstitutionProfile,
  listInstitutions,
  type GetInstitutionProfileDeps,
  type GetInstitutionProfileInput,
} from './core/usecases/get-institution-profile.js';

export {
  downloadInstitutionHistory,
  type DownloadInstitutionHistoryDeps,
  type DownloadInstitutionHistoryInput,
  type InstitutionHistory,
} from './core/usecases/download-institution-history.js';

// ============================================================================
// Shell
// ============================================================================

export { makeIfDataRepo, type IfDataRepoDeps } from './shell/repo/ifdata-repo.js';
export { loadIfDataCatalog, IFDATA_CATALOG_FILE } from './shell/catalog/ifdata-catalog.js';
