/**
 * Expectations Module - Pure Functions
 */

import { err, type Result } from 'neverthrow';

import {
  requireColumns,
  toDate,
  toNumber,
  type Row,
  type TabularResult,
} from '@/common/types/tabular.js';
import { filterLatestSnapshot } from '@/modules/snapshot/index.js';

import type { ExpectationColumns, ExpectationRow } from './types.js';
import type { EmptyResultError, MalformedInputError } from '@/common/types/errors.js';

/**
 * `count` consecutive years starting at the current UTC year.
 */
export function defaultReferenceYears(today: Date, count: number): number[] {
  const year = today.getUTCFullYear();
  return Array.from({ length: count }, (_, offset) => year + offset);
}

const toExpectationRow = (
  row: Row,
  columns: ExpectationColumns,
  referenceYear: number
): ExpectationRow => ({
  referenceYear,
  mean: toNumber(row[columns.mean]),
  median: toNumber(row[columns.median]),
  stdDev: toNumber(row[columns.stdDev]),
  min: toNumber(row[columns.min]),
  max: toNumber(row[columns.max]),
  respondents: toNumber(row[columns.respondents]),
  surveyDate: toDate(row[columns.surveyDate]),
});

/**
 * Rows of the most recent survey for the requested reference years,
 * ascending by year, one row per year (the first one).
 */
export function latestExpectations(
  table: TabularResult,
  columns: ExpectationColumns,
  referenceYears: readonly number[]
): Result<ExpectationRow[], MalformedInputError | EmptyResultError> {
  const check = requireColumns(
    table,
    [columns.referenceYear, columns.mean, columns.median],
    'market expectations'
  );
  if (check.isErr()) {
    return err(check.error);
  }

  return filterLatestSnapshot(table, columns.surveyDate).map((latest) => {
    const wanted = new Set(referenceYears);
    const candidates: ExpectationRow[] = [];
    for (const row of latest) {
      const year = toNumber(row[columns.referenceYear]);
      if (year === null || !Number.isInteger(year) || !wanted.has(year)) continue;
      candidates.push(toExpectationRow(row, columns, year));
    }

    candidates.sort((a, b) => a.referenceYear - b.referenceYear);

    const seen = new Set<number>();
    return candidates.filter((row) => {
      if (seen.has(row.referenceYear)) return false;
      seen.add(row.referenceYear);
      return true;
    });
  });
}
