/**
 * Interest Rates Module - Pure Functions
 */

import { ok, type Result } from 'neverthrow';

import {
  requireColumns,
  toDate,
  toNumber,
  toText,
  type Row,
  type TabularResult,
} from '@/common/types/tabular.js';
import { startOfUtcDay } from '@/common/types/temporal.js';
import { rankPositionTabular, rankTabular } from '@/modules/ranking/index.js';
import { median } from '@/modules/statistics/index.js';

import type { RateColumns } from './types.js';
import type { MalformedInputError } from '@/common/types/errors.js';
import type { Series } from '@/common/types/series.js';
import type { RankPosition, TopBottomRanking } from '@/modules/ranking/index.js';

/**
 * Shorter display name: each replacement applies once, in order.
 */
export const shortModalityLabel = (
  name: string,
  replacements: readonly { from: string; to: string }[]
): string => replacements.reduce((label, { from, to }) => label.split(from).join(to), name);

/**
 * Highest and lowest positive rates of a snapshot. Zero or negative rates
 * are institutions that did not operate in the period.
 */
export function rankModalityRates(
  rows: TabularResult,
  columns: RateColumns,
  n: number
): Result<TopBottomRanking, MalformedInputError> {
  return requireColumns(rows, [columns.rate, columns.institution], 'interest-rate snapshot').andThen(
    () => {
      const positive = rows.filter((row) => (toNumber(row[columns.rate]) ?? 0) > 0);
      return rankTabular(
        positive,
        { value: columns.rate, entityId: columns.institution },
        'descending',
        n
      );
    }
  );
}

/**
 * An institution's rate in a snapshot and its position among the
 * institutions with a rate: the number of strictly lower rates, plus one.
 */
export function bankRatePosition(
  rows: TabularResult,
  columns: RateColumns,
  institution: string
): Result<{ rate: number | null; position: RankPosition | null } | null, MalformedInputError> {
  return rankPositionTabular(
    rows,
    { value: columns.rate, entityId: columns.institution },
    institution,
    'ascending'
  ).map((position) => {
    const own = rows.find((row) => toText(row[columns.institution]) === institution);
    if (own === undefined) {
      return null;
    }
    return { rate: toNumber(own[columns.rate]), position };
  });
}

/**
 * Institution names found in the snapshots, sorted for display.
 */
export function collectInstitutions(
  snapshots: readonly { rows: TabularResult }[],
  column: string
): string[] {
  const names = new Set<string>();
  for (const snapshot of snapshots) {
    for (const row of snapshot.rows) {
      const name = toText(row[column]);
      if (name !== null) names.add(name);
    }
  }
  return Array.from(names).sort((a, b) => a.localeCompare(b, 'pt-BR'));
}

/**
 * Median rate per reference date, ascending. Only dates on or after
 * `since` count, unless none are; then every date does.
 */
export function medianRateByDate(
  rows: TabularResult,
  dateColumn: string,
  rateColumn: string,
  since: Date
): Result<{ observations: number; series: Series }, MalformedInputError> {
  return requireColumns(rows, [dateColumn, rateColumn], 'interest-rate history').andThen(() => {
    const dated: { date: Date; row: Row }[] = [];
    for (const row of rows) {
      const date = toDate(row[dateColumn]);
      if (date !== null) dated.push({ date, row });
    }

    const recent = dated.filter((entry) => entry.date >= since);
    const window = recent.length > 0 ? recent : dated;

    const byDate = new Map<number, number[]>();
    for (const { date, row } of window) {
      const key = startOfUtcDay(date).getTime();
      const rates = byDate.get(key) ?? [];
      const rate = toNumber(row[rateColumn]);
      if (rate !== null) rates.push(rate);
      byDate.set(key, rates);
    }

    const series: Series = Array.from(byDate, ([time, rates]) => ({
      date: new Date(time),
      value: median(rates),
    })).sort((a, b) => a.date.getTime() - b.date.getTime());

    return ok({ observations: window.length, series });
  });
}

/**
 * Rows whose date falls within `[start, end]`, both included.
 */
export function filterByDateRange(
  rows: TabularResult,
  dateColumn: string,
  range: { start: Date; end: Date }
): Result<TabularResult, MalformedInputError> {
  return requireColumns(rows, [dateColumn], 'interest-rate history').map(() =>
    rows.filter((row) => {
      const date = toDate(row[dateColumn]);
      return date !== null && date >= range.start && date <= range.end;
    })
  );
}
