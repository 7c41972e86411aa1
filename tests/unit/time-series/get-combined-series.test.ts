import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { Frequency, utcDate } from '@/common/types/temporal.js';
import { getCombinedSeries, loadSeriesCatalog } from '@/modules/time-series/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';
import { makeFakeSgsClient } from '../../fixtures/fakes.js';

const loadCatalog = async () => (await loadSeriesCatalog(path.resolve('catalogs')))._unsafeUnwrap();

const range = { start: utcDate(2024, 1, 1), end: utcDate(2024, 3, 31) };

const makeSource = () =>
  makeFakeSgsClient({
    series: {
      433: [
        { date: utcDate(2024, 1, 31), value: 0.42 },
        { date: utcDate(2024, 2, 29), value: 0.83 },
      ],
      432: [
        { date: utcDate(2024, 1, 15), value: 11.75 },
        { date: utcDate(2024, 2, 1), value: 11.25 },
      ],
    },
  });

describe('loadSeriesCatalog', () => {
  it('loads the bundled series', async () => {
    const catalog = await loadCatalog();

    expect(catalog.categories).toHaveLength(6);
    expect(catalog.byCode.size).toBe(20);
    expect(catalog.byCode.get(4380)?.frequency).toBe(Frequency.QUARTER);
  });
});

describe('getCombinedSeries', () => {
  it('aligns the series with forward fill and splits the axes', async () => {
    const source = makeSource();
    const catalog = await loadCatalog();

    const result = (
      await getCombinedSeries(
        { source, catalog, logger: makeTestLogger() },
        {
          selections: [
            { code: 433, name: 'IPCA' },
            { code: 432, name: 'Selic Meta' },
            { code: 999, name: '' },
            { code: 433, name: 'again' },
          ],
          range,
          resample: 'none',
        }
      )
    )._unsafeUnwrap();

    expect(source.calls.map((call) => call.code)).toEqual([433, 432, 999]);
    expect(result.table.columns).toEqual(['433_IPCA', '432_Selic Meta', '999']);
    expect(result.table.rows).toEqual([
      { date: utcDate(2024, 1, 15), values: { '432_Selic Meta': 11.75 } },
      { date: utcDate(2024, 1, 31), values: { '433_IPCA': 0.42, '432_Selic Meta': 11.75 } },
      { date: utcDate(2024, 2, 1), values: { '433_IPCA': 0.42, '432_Selic Meta': 11.25 } },
      { date: utcDate(2024, 2, 29), values: { '433_IPCA': 0.83, '432_Selic Meta': 11.25 } },
    ]);
    expect(result.chartColumns).toEqual(['433_IPCA', '432_Selic Meta', '999']);
    expect(result.axes).toEqual({
      split: true,
      primary: ['433_IPCA', '999'],
      secondary: ['432_Selic Meta'],
    });
    expect(result.warnings).toEqual([
      { type: 'MIXED_FREQUENCIES', frequencies: [Frequency.MONTH, Frequency.DAY] },
    ]);
  });

  it('resamples before aligning', async () => {
    const catalog = await loadCatalog();
    const result = (
      await getCombinedSeries(
        { source: makeSource(), catalog, logger: makeTestLogger() },
        {
          selections: [
            { code: 433, name: 'IPCA' },
            { code: 432, name: 'Selic Meta' },
          ],
          range,
          resample: 'monthly',
        }
      )
    )._unsafeUnwrap();

    expect(result.table.rows).toEqual([
      { date: utcDate(2024, 1, 31), values: { '433_IPCA': 0.42, '432_Selic Meta': 11.75 } },
      { date: utcDate(2024, 2, 29), values: { '433_IPCA': 0.83, '432_Selic Meta': 11.25 } },
    ]);
  });

  it('keeps the selection order for bare codes', async () => {
    const catalog = await loadCatalog();
    const result = (
      await getCombinedSeries(
        { source: makeSource(), catalog, logger: makeTestLogger() },
        {
          selections: [
            { code: 433, name: '' },
            { code: 432, name: '' },
          ],
          range,
          resample: 'none',
        }
      )
    )._unsafeUnwrap();

    expect(result.table.columns).toEqual(['433', '432']);
  });

  it('rejects an empty selection and an inverted range', async () => {
    const deps = { source: makeSource(), catalog: await loadCatalog(), logger: makeTestLogger() };

    const empty = await getCombinedSeries(deps, { selections: [], range, resample: 'none' });
    const inverted = await getCombinedSeries(deps, {
      selections: [{ code: 433, name: '' }],
      range: { start: range.end, end: range.start },
      resample: 'none',
    });

    expect(empty._unsafeUnwrapErr().type).toBe('NO_SERIES_SELECTED');
    expect(inverted._unsafeUnwrapErr().type).toBe('INVALID_DATE_RANGE');
  });
});
