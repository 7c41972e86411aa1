/**
 * Ranking Module - Pure Functions
 *
 * Ties keep input order: every sort here relies on Array.prototype.sort
 * being stable.
 */

import { ok, type Result } from 'neverthrow';

import { requireColumns, toNumber, toText, type TabularResult } from '@/common/types/tabular.js';
import { wideValue, type WideTable } from '@/common/types/wide-table.js';

import type {
  RankedVariable,
  RankingBuckets,
  RankingRow,
  RankPosition,
  SortDirection,
  TabularRankingColumns,
  TopBottomRanking,
} from './types.js';
import type { MalformedInputError } from '@/common/types/errors.js';

interface Candidate {
  entityId: string;
  entityName: string;
  value: number;
}

const opposite = (direction: SortDirection): SortDirection =>
  direction === 'descending' ? 'ascending' : 'descending';

const compare =
  (direction: SortDirection) =>
  (a: Candidate, b: Candidate): number =>
    direction === 'descending' ? b.value - a.value : a.value - b.value;

const isMoreExtreme = (value: number, reference: number, direction: SortDirection): boolean =>
  direction === 'descending' ? value > reference : value < reference;

const toRankingRows = (sorted: readonly Candidate[], n: number, total: number): RankingRow[] =>
  sorted.slice(0, Math.max(0, n)).map((candidate, index) => ({
    ...candidate,
    rank: index + 1,
    total,
  }));

function rankCandidates(
  candidates: readonly Candidate[],
  direction: SortDirection,
  n: number
): TopBottomRanking {
  const total = candidates.length;
  const top = [...candidates].sort(compare(direction));
  const bottom = [...candidates].sort(compare(opposite(direction)));

  return {
    top: toRankingRows(top, n, total),
    bottom: toRankingRows(bottom, n, total),
    total,
  };
}

function wideCandidates(table: WideTable, variable: string): Candidate[] {
  const candidates: Candidate[] = [];
  for (const row of table.rows) {
    const value = wideValue(row, variable);
    if (value !== null) {
      candidates.push({ entityId: row.entityId, entityName: row.entityName, value });
    }
  }
  return candidates;
}

function tabularCandidates(table: TabularResult, columns: TabularRankingColumns): Candidate[] {
  const nameColumn = columns.entityName ?? columns.entityId;
  const candidates: Candidate[] = [];
  for (const row of table) {
    const value = toNumber(row[columns.value]);
    const entityId = toText(row[columns.entityId]);
    if (value === null || entityId === null) continue;

    candidates.push({
      entityId,
      entityName: toText(row[nameColumn]) ?? entityId,
      value,
    });
  }
  return candidates;
}

const requireRankingColumns = (
  table: TabularResult,
  columns: TabularRankingColumns
): Result<void, MalformedInputError> =>
  requireColumns(
    table,
    [columns.value, columns.entityId, columns.entityName ?? columns.entityId],
    'ranking source table'
  );

function positionAmong(
  candidates: readonly Candidate[],
  entityId: string,
  direction: SortDirection
): RankPosition | null {
  const own = candidates.find((candidate) => candidate.entityId === entityId);
  if (own === undefined) {
    return null;
  }

  const moreExtreme = candidates.filter((candidate) =>
    isMoreExtreme(candidate.value, own.value, direction)
  ).length;

  return { rank: moreExtreme + 1, total: candidates.length };
}

/**
 * Top and bottom N entities of a wide table for one variable.
 * Entities without a value are left out before ranking.
 */
export function rankTopBottom(
  table: WideTable,
  variable: string,
  direction: SortDirection,
  n: number
): TopBottomRanking {
  return rankCandidates(wideCandidates(table, variable), direction, n);
}

/**
 * Position of one entity: the number of entities strictly more extreme, plus one.
 * Returns null when the entity is unknown or has no value.
 */
export function computeRankPosition(
  table: WideTable,
  entityId: string,
  variable: string,
  direction: SortDirection
): RankPosition | null {
  return positionAmong(wideCandidates(table, variable), entityId, direction);
}

/**
 * The "largest" and "smallest" display buckets of a variable.
 *
 * For a variable where smaller is better, the "largest" bucket holds the
 * ascending sort: label and direction flip together.
 */
export function rankingBuckets(
  table: WideTable,
  variable: string,
  meta: RankedVariable,
  n: number
): RankingBuckets {
  const ranking = rankTopBottom(table, variable, meta.sortDirection, n);

  return {
    largest: {
      labelKey: meta.labelKeys.largest,
      direction: meta.sortDirection,
      rows: ranking.top,
    },
    smallest: {
      labelKey: meta.labelKeys.smallest,
      direction: opposite(meta.sortDirection),
      rows: ranking.bottom,
    },
    total: ranking.total,
  };
}

/**
 * Same ranking over a raw table, one row per entity.
 */
export function rankTabular(
  table: TabularResult,
  columns: TabularRankingColumns,
  direction: SortDirection,
  n: number
): Result<TopBottomRanking, MalformedInputError> {
  return requireRankingColumns(table, columns).andThen(() =>
    ok(rankCandidates(tabularCandidates(table, columns), direction, n))
  );
}

/**
 * Rank position over a raw table. Rows without a value are not counted.
 */
export function rankPositionTabular(
  table: TabularResult,
  columns: TabularRankingColumns,
  entityId: string,
  direction: SortDirection
): Result<RankPosition | null, MalformedInputError> {
  return requireRankingColumns(table, columns).andThen(() =>
    ok(positionAmong(tabularCandidates(table, columns), entityId, direction))
  );
}
