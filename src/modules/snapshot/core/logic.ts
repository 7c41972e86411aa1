/**
 * Snapshot Module - Pure Functions
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createEmptyResultError,
  createMalformedInputError,
  type EmptyResultError,
  type MalformedInputError,
} from '@/common/types/errors.js';
import { hasColumn, type CellValue, type TabularResult } from '@/common/types/tabular.js';

import type { LatestSnapshotOptions } from './types.js';
import type { Series, SeriesPoint } from '@/common/types/series.js';

/**
 * Orders date cells. Numbers are taken as-is (e.g. `202312` year-months),
 * strings are parsed as dates.
 */
const dateKey = (cell: CellValue | undefined): number | null => {
  if (cell instanceof Date) {
    const time = cell.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell === 'string' && cell.trim() !== '') {
    const time = Date.parse(cell.trim());
    return Number.isNaN(time) ? null : time;
  }
  return null;
};

/**
 * Keeps the rows at the most recent date of `dateColumn` (or at `target`).
 *
 * Every row sharing that date is kept. An empty table comes back as is,
 * unless the caller requires a non-empty result.
 */
export function filterLatestSnapshot(
  table: TabularResult,
  dateColumn: string,
  options: LatestSnapshotOptions = {}
): Result<TabularResult, MalformedInputError | EmptyResultError> {
  if (!hasColumn(table, dateColumn)) {
    return err(createMalformedInputError(dateColumn, 'latest snapshot filter'));
  }

  let selected: number | null = null;
  if (options.target !== undefined) {
    selected = dateKey(options.target);
  } else {
    for (const row of table) {
      const key = dateKey(row[dateColumn]);
      if (key !== null && (selected === null || key > selected)) {
        selected = key;
      }
    }
  }

  const rows = selected === null ? [] : table.filter((row) => dateKey(row[dateColumn]) === selected);

  if (rows.length === 0) {
    if (options.requireNonEmpty === true) {
      return err(createEmptyResultError(`latest snapshot of '${dateColumn}'`));
    }
    return ok(table.length === 0 ? table : rows);
  }
  return ok(rows);
}

/**
 * Most recent non-missing observation of a series.
 */
export function latestValue(series: Series): SeriesPoint | null {
  let latest: SeriesPoint | null = null;
  for (const point of series) {
    if (point.value !== null && (latest === null || point.date > latest.date)) {
      latest = point;
    }
  }
  return latest;
}
