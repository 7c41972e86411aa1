/**
 * Ranking Module - Types
 */

/**
 * `descending`: larger values rank first. `ascending`: smaller values rank first.
 */
export type SortDirection = 'ascending' | 'descending';

export interface RankingRow {
  readonly entityId: string;
  readonly entityName: string;
  readonly value: number;
  /** 1-based */
  readonly rank: number;
  /** Entities with a value for the variable */
  readonly total: number;
}

export interface TopBottomRanking {
  /** Most extreme values in the requested direction */
  readonly top: readonly RankingRow[];
  /** Opposite tail; rank 1 is the least extreme value */
  readonly bottom: readonly RankingRow[];
  readonly total: number;
}

export interface RankPosition {
  readonly rank: number;
  readonly total: number;
}

/**
 * Ranking metadata a variable catalog entry provides.
 */
export interface RankedVariable {
  readonly sortDirection: SortDirection;
  readonly labelKeys: {
    readonly largest: string;
    readonly smallest: string;
  };
}

/**
 * One side of a ranking display.
 */
export interface RankingBucket {
  readonly labelKey: string;
  readonly direction: SortDirection;
  readonly rows: readonly RankingRow[];
}

export interface RankingBuckets {
  readonly largest: RankingBucket;
  readonly smallest: RankingBucket;
  readonly total: number;
}

/**
 * Columns that identify entities in a raw table.
 */
export interface TabularRankingColumns {
  readonly value: string;
  readonly entityId: string;
  /** Defaults to the entity id column */
  readonly entityName?: string;
}
