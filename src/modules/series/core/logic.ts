/**
 * Series Module - Pure Functions
 *
 * Resampling, alignment and conversion of date-indexed series.
 */

import { ok, type Result } from 'neverthrow';

import { requireColumns, toDate, toNumber, type TabularResult } from '@/common/types/tabular.js';
import {
  addUtcDays,
  endOfUtcMonth,
  endOfUtcYear,
  startOfUtcDay,
  type ResampleFrequency,
} from '@/common/types/temporal.js';

import type { AlignedRow, AlignedTable } from './types.js';
import type { MalformedInputError } from '@/common/types/errors.js';
import type { Series, SeriesPoint } from '@/common/types/series.js';

const byDate = (a: SeriesPoint, b: SeriesPoint): number => a.date.getTime() - b.date.getTime();

const periodEnd = (date: Date, frequency: 'monthly' | 'annual'): Date =>
  frequency === 'monthly' ? endOfUtcMonth(date) : endOfUtcYear(date);

/**
 * Resamples a series to a coarser frequency.
 *
 * Each period is labelled with its last calendar day and holds the mean of
 * the non-missing observations that fall in it. Periods without any
 * observation are left out. `none` returns the input as is.
 */
export function resampleSeries(series: Series, frequency: ResampleFrequency): Series {
  if (frequency === 'none') {
    return series;
  }

  const buckets = new Map<number, { date: Date; sum: number; count: number }>();
  for (const point of series) {
    if (point.value === null) continue;

    const label = periodEnd(point.date, frequency);
    const key = label.getTime();
    const bucket = buckets.get(key);
    if (bucket === undefined) {
      buckets.set(key, { date: label, sum: point.value, count: 1 });
    } else {
      bucket.sum += point.value;
      bucket.count += 1;
    }
  }

  return Array.from(buckets.values())
    .map((bucket) => ({ date: bucket.date, value: bucket.sum / bucket.count }))
    .sort(byDate);
}

interface Cursor {
  name: string;
  points: SeriesPoint[];
  position: number;
  last: number | undefined;
}

/**
 * Joins several series on one date index, carrying each series' latest
 * observation forward. Missing observations never overwrite a carried value.
 *
 * @param index - Dates to report; defaults to the union of all series dates
 */
export function alignSeries(
  seriesByName: Readonly<Record<string, Series>>,
  index?: readonly Date[]
): AlignedTable {
  const columns = Object.keys(seriesByName);

  const dates = index ?? unionOfDates(Object.values(seriesByName));
  const sortedDates = [...dates].sort((a, b) => a.getTime() - b.getTime());

  const cursors = columns.map(
    (name): Cursor => ({
      name,
      points: [...(seriesByName[name] ?? [])].sort(byDate),
      position: 0,
      last: undefined,
    })
  );

  const rows: AlignedRow[] = sortedDates.map((date) => {
    const values: Record<string, number> = {};
    const time = date.getTime();

    for (const cursor of cursors) {
      let point = cursor.points[cursor.position];
      while (point !== undefined && point.date.getTime() <= time) {
        if (point.value !== null) {
          cursor.last = point.value;
        }
        cursor.position += 1;
        point = cursor.points[cursor.position];
      }
      if (cursor.last !== undefined) {
        values[cursor.name] = cursor.last;
      }
    }

    return { date, values };
  });

  return { columns, rows };
}

function unionOfDates(allSeries: readonly Series[]): Date[] {
  const seen = new Map<number, Date>();
  for (const series of allSeries) {
    for (const point of series) {
      const key = point.date.getTime();
      if (!seen.has(key)) {
        seen.set(key, point.date);
      }
    }
  }
  return Array.from(seen.values());
}

/**
 * Every UTC day from `start` to `end`, both included.
 */
export function dailyIndex(start: Date, end: Date): Date[] {
  const last = startOfUtcDay(end).getTime();
  const days: Date[] = [];
  for (let day = startOfUtcDay(start); day.getTime() <= last; day = addUtcDays(day, 1)) {
    days.push(day);
  }
  return days;
}

/**
 * Reads a series out of a table.
 *
 * Rows without a parseable date are dropped; non-numeric values become
 * missing. When dates repeat, the first row wins.
 */
export function seriesFromTable(
  table: TabularResult,
  dateColumn: string,
  valueColumn: string
): Result<Series, MalformedInputError> {
  return requireColumns(table, [dateColumn, valueColumn], 'series source table').andThen(() => {
    const points: SeriesPoint[] = [];
    for (const row of table) {
      const date = toDate(row[dateColumn]);
      if (date !== null) {
        points.push({ date, value: toNumber(row[valueColumn]) });
      }
    }

    // Array.prototype.sort is stable, so the first duplicate stays first
    points.sort(byDate);

    const unique: SeriesPoint[] = [];
    let previous: number | undefined;
    for (const point of points) {
      const time = point.date.getTime();
      if (time !== previous) {
        unique.push(point);
        previous = time;
      }
    }
    return ok(unique);
  });
}
