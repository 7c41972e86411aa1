/**
 * Instant Payments Module - Pure Functions
 */

import { err, ok, type Result } from 'neverthrow';

import { requireColumns, toDate, toNumber } from '@/common/types/tabular.js';
import { addUtcDays, formatIsoDate } from '@/common/types/temporal.js';
import { mean, median, quantile, sampleStd } from '@/modules/statistics/index.js';

import { createInvalidPeriodError, type InvalidPeriodError } from './errors.js';
import {
  PIX_COLUMNS,
  PIX_METRICS,
  type MetricComparison,
  type MetricSummary,
  type PeriodComparison,
  type PixDay,
  type PixKpis,
  type PixMetric,
} from './types.js';

import type { MalformedInputError } from '@/common/types/errors.js';
import type { TabularResult } from '@/common/types/tabular.js';
import type { DateRange } from '@/infra/bcb/index.js';
import type { FlatRow } from '@/modules/export/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function validatePeriod(
  range: DateRange,
  label: string
): Result<DateRange, InvalidPeriodError> {
  if (range.start.getTime() > range.end.getTime()) {
    return err(
      createInvalidPeriodError(
        `${label} starts on ${formatIsoDate(range.start)}, after its end ${formatIsoDate(range.end)}`
      )
    );
  }
  return ok(range);
}

/**
 * Settlement days of a table, oldest first. Rows without a parseable date
 * are dropped; non-numeric measures become missing.
 */
export function parsePixDays(table: TabularResult): Result<PixDay[], MalformedInputError> {
  const columns = requireColumns(table, Object.values(PIX_COLUMNS), 'settled Pix transactions');
  if (columns.isErr()) {
    return err(columns.error);
  }

  const days: PixDay[] = [];
  for (const row of table) {
    const date = toDate(row[PIX_COLUMNS.date]);
    if (date === null) continue;
    days.push({
      date,
      quantity: toNumber(row[PIX_COLUMNS.quantity]),
      total: toNumber(row[PIX_COLUMNS.total]),
      average: toNumber(row[PIX_COLUMNS.average]),
    });
  }

  return ok(days.sort((a, b) => a.date.getTime() - b.date.getTime()));
}

/** Days within the range, both ends inclusive */
export const filterDays = (days: readonly PixDay[], range: DateRange): PixDay[] =>
  days.filter((day) => day.date >= range.start && day.date <= range.end);

const metricValues = (days: readonly PixDay[], metric: PixMetric): number[] => {
  const values: number[] = [];
  for (const day of days) {
    const value = day[metric];
    if (value !== null) values.push(value);
  }
  return values;
};

const total = (values: readonly number[]): number =>
  values.reduce((sum, value) => sum + value, 0);

export function computeKpis(days: readonly PixDay[]): PixKpis {
  return {
    days: days.length,
    totalQuantity: total(metricValues(days, 'quantity')),
    totalVolume: total(metricValues(days, 'total')),
    averageTicket: mean(metricValues(days, 'average')),
  };
}

export function summarizeMetrics(days: readonly PixDay[]): MetricSummary[] {
  return PIX_METRICS.map((metric) => {
    const values = metricValues(days, metric);
    return {
      metric,
      mean: mean(values),
      median: median(values),
      std: sampleStd(values),
      min: values.length === 0 ? null : Math.min(...values),
      max: values.length === 0 ? null : Math.max(...values),
      q1: quantile(values, 0.25),
      q3: quantile(values, 0.75),
    };
  });
}

export function relativeChange(before: number | null, after: number | null): number | null {
  if (before === null || after === null || before === 0) return null;
  return (after - before) / before;
}

/**
 * Splits a range at its midpoint: A runs from the start to the midpoint,
 * B from the day after to the end.
 */
export function defaultComparisonPeriods(range: DateRange): {
  periodA: DateRange;
  periodB: DateRange;
} {
  const spanDays = Math.round((range.end.getTime() - range.start.getTime()) / DAY_MS);
  const midpoint = addUtcDays(range.start, Math.floor(spanDays / 2));
  return {
    periodA: { start: range.start, end: midpoint },
    periodB: { start: addUtcDays(midpoint, 1), end: range.end },
  };
}

/**
 * Daily averages of each metric in two periods. Null when either period has
 * no settlement day.
 */
export function comparePeriods(
  days: readonly PixDay[],
  periodA: DateRange,
  periodB: DateRange
): PeriodComparison | null {
  const daysA = filterDays(days, periodA);
  const daysB = filterDays(days, periodB);
  if (daysA.length === 0 || daysB.length === 0) {
    return null;
  }

  const metrics = PIX_METRICS.map((metric): MetricComparison => {
    const averageA = mean(metricValues(daysA, metric));
    const averageB = mean(metricValues(daysB, metric));
    return { metric, averageA, averageB, change: relativeChange(averageA, averageB) };
  });

  return { periodA, periodB, metrics };
}

/**
 * Export rows under the source column names.
 */
export const flattenPixDays = (days: readonly PixDay[]): FlatRow[] =>
  days.map((day) => ({
    [PIX_COLUMNS.date]: day.date,
    [PIX_COLUMNS.quantity]: day.quantity,
    [PIX_COLUMNS.total]: day.total,
    [PIX_COLUMNS.average]: day.average,
  }));
