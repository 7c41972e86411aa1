/**
 * Instant Payments Module Public API
 *
 * Daily settled Pix transactions: totals, statistics and period comparison.
 */

// ============================================================================
// Types
// ============================================================================

export {
  PIX_COLUMNS,
  PIX_LAUNCH_DATE,
  PIX_METRICS,
  type MetricComparison,
  type MetricSummary,
  type PeriodComparison,
  type PixDay,
  type PixKpis,
  type PixMetric,
  type PixOverview,
} from './core/types.js';

// ============================================================================
// Errors
// ============================================================================

export type { InstantPaymentsError, InvalidPeriodError } from './core/errors.js';
export { createInvalidPeriodError } from './core/errors.js';

// ============================================================================
// Logic
// ============================================================================

export {
  comparePeriods,
  computeKpis,
  defaultComparisonPeriods,
  filterDays,
  flattenPixDays,
  parsePixDays,
  relativeChange,
  summarizeMetrics,
  validatePeriod,
} from './core/logic.js';

// ============================================================================
// Ports
// ============================================================================

export type { PixRepository } from './core/ports.js';

// ============================================================================
// Use Cases
// ============================================================================

export {
  getPixOverview,
  type GetPixOverviewDeps,
  type GetPixOverviewInput,
} from './core/usecases/get-pix-overview.js';

// ============================================================================
// Shell
// ============================================================================

export { makePixRepo, type PixRepoDeps } from './shell/repo/pix-repo.js';
