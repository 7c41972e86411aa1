import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { utcDate } from '@/common/types/temporal.js';
import {
  allStates,
  averageOfModes,
  buildDelinquencyCatalog,
  downloadDelinquency,
  findStateRegion,
  getDelinquencyMap,
  getRegionalSeries,
  getStateComparison,
  loadDelinquencyCatalog,
  seriesWindow,
  type DelinquencyCatalogFile,
} from '@/modules/delinquency/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';
import { makeFakeDelinquencyRepo } from '../../fixtures/fakes.js';

const file: DelinquencyCatalogFile = {
  fallbackColor: '#94A3B8',
  seriesMonths: 12,
  regions: [
    {
      code: 'N',
      name: 'Norte',
      color: '#22D3EE',
      sgs: { pf: 100, pj: 200 },
      states: [
        { code: 'PA', name: 'Pará', sgs: { pf: 101, pj: 201 } },
        { code: 'AC', name: 'Acre', sgs: { pf: 102, pj: 202 } },
        { code: 'AM', name: 'Amazonas', sgs: { pf: 103, pj: 203 } },
      ],
    },
    {
      code: 'SE',
      name: 'Sudeste',
      color: '#FB7185',
      sgs: { pf: 110, pj: 210 },
      states: [
        { code: 'SP', name: 'São Paulo', sgs: { pf: 111, pj: 211 } },
        { code: 'RJ', name: 'Rio de Janeiro', sgs: { pf: 112, pj: 212 } },
      ],
    },
  ],
};

const catalog = buildDelinquencyCatalog(file)._unsafeUnwrap();

const point = (year: number, month: number, day: number, value: number | null) => ({
  date: utcDate(year, month, day),
  value,
});

describe('buildDelinquencyCatalog', () => {
  it('builds the palette from the region colours', () => {
    expect(catalog.palette['N']).toEqual({ r: 0x22, g: 0xd3, b: 0xee });
    expect(catalog.fallbackColor).toEqual({ r: 0x94, g: 0xa3, b: 0xb8 });
  });

  it('reports duplicated codes and invalid colours', () => {
    const error = buildDelinquencyCatalog({
      ...file,
      regions: [
        {
          code: 'N',
          name: 'Norte',
          color: 'teal',
          sgs: { pf: 1, pj: 2 },
          states: [{ code: 'AC', name: 'Acre', sgs: { pf: 3, pj: 4 } }],
        },
        {
          code: 'N',
          name: 'Norte 2',
          color: '#000000',
          sgs: { pf: 5, pj: 6 },
          states: [{ code: 'AC', name: 'Acre', sgs: { pf: 7, pj: 8 } }],
        },
      ],
    })._unsafeUnwrapErr();

    expect(error.details).toEqual([
      "region 'N' is declared more than once",
      "state 'AC' belongs to more than one region",
      "region 'N' has an invalid colour 'teal'",
    ]);
  });
});

describe('catalog lookups', () => {
  it('lists states sorted by code', () => {
    expect(allStates(catalog).map((state) => state.code)).toEqual(['AC', 'AM', 'PA', 'RJ', 'SP']);
  });

  it('finds the region of a state', () => {
    expect(findStateRegion(catalog, 'RJ')._unsafeUnwrap().region.code).toBe('SE');
    expect(findStateRegion(catalog, 'XX')._unsafeUnwrapErr()).toEqual({
      type: 'UNKNOWN_STATE',
      state: 'XX',
      message: "State 'XX' is not in any region",
    });
  });

  it('loads the bundled regions', async () => {
    const loaded = (await loadDelinquencyCatalog(path.resolve('catalogs')))._unsafeUnwrap();

    expect(loaded.regions.map((region) => region.code)).toEqual(['N', 'NE', 'CO', 'SE', 'S']);
    expect(allStates(loaded)).toHaveLength(27);
    // 'SE' is both Sudeste and Sergipe
    expect(findStateRegion(loaded, 'SE')._unsafeUnwrap().region.name).toBe('Nordeste');
  });
});

describe('averageOfModes', () => {
  it('averages the available rates', () => {
    expect(averageOfModes({ pf: 4, pj: 2 })).toBe(3);
    expect(averageOfModes({ pf: null, pj: 2 })).toBe(2);
    expect(averageOfModes({ pf: null, pj: null })).toBeNull();
  });
});

describe('seriesWindow', () => {
  it('starts on the first day of the month, months back', () => {
    expect(seriesWindow(new Date('2024-08-15T13:00:00Z'), 12)).toEqual({
      start: utcDate(2023, 8, 1),
      end: utcDate(2024, 8, 15),
    });
    expect(seriesWindow(utcDate(2024, 2, 29), 48).start).toEqual(utcDate(2020, 2, 1));
  });
});

describe('getDelinquencyMap', () => {
  const repo = makeFakeDelinquencyRepo({
    series: {
      'state:AC:pf': [point(2024, 1, 31, 9), point(2024, 2, 29, 4)],
      'state:AC:pj': [point(2024, 2, 29, 2)],
      'state:AM:pf': [point(2024, 2, 29, 6)],
      'state:AM:pj': [point(2024, 2, 29, 7), point(2024, 3, 31, null)],
      'state:SP:pf': [point(2024, 2, 29, 5)],
      'state:SP:pj': [point(2024, 2, 29, 5)],
      'state:RJ:pf': [point(2024, 2, 29, 5)],
      'region:N:pf': [point(2024, 2, 29, 4.5)],
      'region:N:pj': [point(2024, 2, 29, 3)],
    },
    failing: ['state:PA:pf', 'state:PA:pj', 'region:SE:pf'],
  });

  it('shades states within their region', async () => {
    const map = await getDelinquencyMap({ repo, catalog, logger: makeTestLogger() });

    expect(
      map.states.map((state) => [state.code, state.average, state.factor, state.color])
    ).toEqual([
      ['AC', 3, 0, '#bdf2fa'],
      ['AM', 6, 1, '#22d3ee'],
      ['PA', null, 0.5, '#6fe2f4'],
      ['RJ', 5, 0.5, '#fca3b0'],
      ['SP', 5, 0.5, '#fca3b0'],
    ]);
    expect(map.states[1]).toMatchObject({ pf: 6, pj: null, region: 'N', regionName: 'Norte' });
  });

  it('attaches the region rates, missing on failure', async () => {
    const map = await getDelinquencyMap({ repo, catalog, logger: makeTestLogger() });

    expect(map.regions).toEqual([
      { code: 'N', name: 'Norte', color: '#22d3ee', pf: 4.5, pj: 3 },
      { code: 'SE', name: 'Sudeste', color: '#fb7185', pf: null, pj: null },
    ]);
  });

  it('asks for the last observation of each location and mode', async () => {
    const counting = makeFakeDelinquencyRepo();

    await getDelinquencyMap({ repo: counting, catalog, logger: makeTestLogger() });

    expect(counting.calls).toHaveLength(14);
    expect(counting.calls[0]).toBe('last:state:AC:pf:1');
  });
});

describe('getRegionalSeries', () => {
  it('keeps regions with data inside the window', async () => {
    const repo = makeFakeDelinquencyRepo({
      series: {
        'region:N:pf': [point(2023, 7, 1, 3), point(2023, 9, 1, 4), point(2024, 8, 1, 5)],
        'region:SE:pj': [point(2024, 1, 1, 2)],
      },
      failing: ['region:N:pj'],
    });

    const result = await getRegionalSeries({
      repo,
      catalog,
      logger: makeTestLogger(),
      now: () => utcDate(2024, 8, 15),
    });

    expect(result.pf).toEqual([
      {
        region: 'N',
        name: 'Norte',
        color: '#22d3ee',
        series: [point(2023, 9, 1, 4), point(2024, 8, 1, 5)],
      },
    ]);
    expect(result.pj.map((entry) => entry.region)).toEqual(['SE']);
  });
});

describe('getStateComparison', () => {
  it('pairs the state with its region', async () => {
    const repo = makeFakeDelinquencyRepo({
      series: {
        'state:RJ:pf': [point(2024, 6, 30, 5.1)],
        'region:SE:pf': [point(2024, 6, 30, 4.2)],
      },
    });

    const result = (
      await getStateComparison(
        { repo, catalog, logger: makeTestLogger(), now: () => utcDate(2024, 8, 15) },
        { state: 'RJ' }
      )
    )._unsafeUnwrap();

    expect(result.region.code).toBe('SE');
    expect(result.pf).toEqual({
      state: [point(2024, 6, 30, 5.1)],
      region: [point(2024, 6, 30, 4.2)],
    });
    expect(result.pj).toEqual({ state: [], region: [] });
  });

  it('rejects unknown states', async () => {
    const result = await getStateComparison(
      { repo: makeFakeDelinquencyRepo(), catalog, logger: makeTestLogger() },
      { state: 'ZZ' }
    );

    expect(result._unsafeUnwrapErr().type).toBe('UNKNOWN_STATE');
  });
});

describe('downloadDelinquency', () => {
  const range = { start: utcDate(2024, 1, 1), end: utcDate(2024, 12, 31) };

  it('tags each observation with its location and mode', async () => {
    const repo = makeFakeDelinquencyRepo({
      series: {
        'region:N:pf': [point(2024, 1, 31, 1.5)],
        'region:SE:pj': [point(2024, 2, 29, null)],
      },
      failing: ['region:N:pj'],
    });

    const rows = await downloadDelinquency(
      { repo, catalog, logger: makeTestLogger() },
      { scope: 'regions', range }
    );

    expect(rows).toEqual([
      { Date: '2024-01-31', Valor: 1.5, Local: 'N', Modo: 'PF', NomeLocal: 'Norte' },
      { Date: '2024-02-29', Valor: null, Local: 'SE', Modo: 'PJ', NomeLocal: 'Sudeste' },
    ]);
  });

  it('walks the states in code order', async () => {
    const repo = makeFakeDelinquencyRepo();

    await downloadDelinquency({ repo, catalog, logger: makeTestLogger() }, { scope: 'states', range });

    expect(repo.calls.slice(0, 3)).toEqual([
      'series:state:AC:pf',
      'series:state:AC:pj',
      'series:state:AM:pf',
    ]);
  });
});
