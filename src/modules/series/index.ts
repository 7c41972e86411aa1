/**
 * Series Module Public API
 *
 * Frequency normalization and forward-filled alignment of date-indexed series.
 */

// ============================================================================
// Types
// ============================================================================

export type { AlignedRow, AlignedTable } from './core/types.js';

// ============================================================================
// Logic
// ============================================================================

export { resampleSeries, alignSeries, dailyIndex, seriesFromTable } from './core/logic.js';
