import { describe, expect, it } from 'vitest';

import { utcDate } from '@/common/types/temporal.js';
import {
  alignSeries,
  dailyIndex,
  resampleSeries,
  seriesFromTable,
} from '@/modules/series/index.js';

import type { Series } from '@/common/types/series.js';

const point = (year: number, month: number, day: number, value: number | null) => ({
  date: utcDate(year, month, day),
  value,
});

describe('resampleSeries', () => {
  const daily: Series = [
    point(2024, 1, 2, 10),
    point(2024, 1, 15, 20),
    point(2024, 1, 31, null),
    point(2024, 3, 5, 6),
  ];

  it('returns the input unchanged for none', () => {
    expect(resampleSeries(daily, 'none')).toBe(daily);
  });

  it('averages non-missing values per month, labelled at month end', () => {
    const monthly = resampleSeries(daily, 'monthly');

    expect(monthly).toEqual([
      { date: utcDate(2024, 1, 31), value: 15 },
      { date: utcDate(2024, 3, 31), value: 6 },
    ]);
  });

  it('leaves out periods without observations', () => {
    const monthly = resampleSeries(daily, 'monthly');

    expect(monthly.some((p) => p.date.getUTCMonth() === 1)).toBe(false);
  });

  it('averages per year, labelled at December 31st', () => {
    const annual = resampleSeries(
      [point(2023, 6, 1, 4), point(2023, 12, 1, 8), point(2024, 2, 1, 1)],
      'annual'
    );

    expect(annual).toEqual([
      { date: utcDate(2023, 12, 31), value: 6 },
      { date: utcDate(2024, 12, 31), value: 1 },
    ]);
  });

  it('is idempotent', () => {
    const once = resampleSeries(daily, 'monthly');
    const twice = resampleSeries(once, 'monthly');

    expect(twice).toEqual(once);
  });

  it('sorts unordered input', () => {
    const monthly = resampleSeries([point(2024, 5, 1, 1), point(2024, 2, 1, 2)], 'monthly');

    expect(monthly.map((p) => p.date)).toEqual([utcDate(2024, 2, 29), utcDate(2024, 5, 31)]);
  });
});

describe('alignSeries', () => {
  it('forward-fills a missing observation and leaves the leading gap absent', () => {
    const series: Series = [point(2024, 1, 1, 10), point(2024, 1, 3, null), point(2024, 1, 5, 20)];
    const index = dailyIndex(utcDate(2023, 12, 31), utcDate(2024, 1, 5));

    const aligned = alignSeries({ selic: series }, index);

    expect(aligned.columns).toEqual(['selic']);
    expect(aligned.rows.map((row) => row.values['selic'])).toEqual([
      undefined,
      10,
      10,
      10,
      10,
      20,
    ]);
    expect(aligned.rows[0]!.values).toEqual({});
  });

  it('joins on the union of dates when no index is given', () => {
    const monthly: Series = [point(2024, 1, 31, 1), point(2024, 2, 29, 2)];
    const daily: Series = [point(2024, 2, 1, 100), point(2024, 2, 29, 200)];

    const aligned = alignSeries({ monthly, daily });

    expect(aligned.rows).toEqual([
      { date: utcDate(2024, 1, 31), values: { monthly: 1 } },
      { date: utcDate(2024, 2, 1), values: { monthly: 1, daily: 100 } },
      { date: utcDate(2024, 2, 29), values: { monthly: 2, daily: 200 } },
    ]);
  });

  it('returns no rows for empty input', () => {
    expect(alignSeries({})).toEqual({ columns: [], rows: [] });
  });
});

describe('dailyIndex', () => {
  it('includes both ends', () => {
    expect(dailyIndex(utcDate(2024, 2, 28), utcDate(2024, 3, 1))).toEqual([
      utcDate(2024, 2, 28),
      utcDate(2024, 2, 29),
      utcDate(2024, 3, 1),
    ]);
  });

  it('is empty when the end precedes the start', () => {
    expect(dailyIndex(utcDate(2024, 3, 1), utcDate(2024, 2, 1))).toEqual([]);
  });
});

describe('seriesFromTable', () => {
  it('sorts, keeps the first duplicate and marks non-numeric values missing', () => {
    const table = [
      { data: utcDate(2024, 1, 2), valor: 2 },
      { data: utcDate(2024, 1, 1), valor: '1.5' },
      { data: utcDate(2024, 1, 2), valor: 99 },
      { data: utcDate(2024, 1, 3), valor: 'n/a' },
      { data: 'not a date', valor: 7 },
    ];

    const series = seriesFromTable(table, 'data', 'valor')._unsafeUnwrap();

    expect(series).toEqual([
      { date: utcDate(2024, 1, 1), value: 1.5 },
      { date: utcDate(2024, 1, 2), value: 2 },
      { date: utcDate(2024, 1, 3), value: null },
    ]);
  });

  it('fails when the value column is absent', () => {
    const result = seriesFromTable([{ data: utcDate(2024, 1, 1) }], 'data', 'valor');

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'MalformedInputError',
      column: 'valor',
    });
  });

  it('accepts an empty table', () => {
    expect(seriesFromTable([], 'data', 'valor')._unsafeUnwrap()).toEqual([]);
  });
});
