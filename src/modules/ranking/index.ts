/**
 * Ranking Module Public API
 *
 * Top/bottom rankings and individual rank positions with deterministic ties.
 */

// ============================================================================
// Types
// ============================================================================

export type {
  SortDirection,
  RankingRow,
  TopBottomRanking,
  RankPosition,
  RankedVariable,
  RankingBucket,
  RankingBuckets,
  TabularRankingColumns,
} from './core/types.js';

// ============================================================================
// Logic
// ============================================================================

export {
  rankTopBottom,
  computeRankPosition,
  rankingBuckets,
  rankTabular,
  rankPositionTabular,
} from './core/logic.js';
