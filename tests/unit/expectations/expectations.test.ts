import path from 'node:path';

import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { utcDate } from '@/common/types/temporal.js';
import {
  defaultReferenceYears,
  getMarketExpectations,
  latestExpectations,
  loadExpectationsCatalog,
  makeExpectationsRepo,
  type ExpectationsCatalog,
  type ExpectationsRepository,
} from '@/modules/expectations/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';
import { makeFakeODataClient, transportFailure } from '../../fixtures/fakes.js';

import type { TabularResult } from '@/common/types/tabular.js';

const columns = {
  indicator: 'Indicador',
  surveyDate: 'Data',
  referenceYear: 'DataReferencia',
  mean: 'Media',
  median: 'Mediana',
  stdDev: 'DesvioPadrao',
  min: 'Minimo',
  max: 'Maximo',
  respondents: 'numeroRespondentes',
};

const catalog: ExpectationsCatalog = {
  service: 'Expectativas',
  endpoint: 'ExpectativasMercadoAnuais',
  columns,
  limit: 100,
  referenceYearCount: 3,
  indicators: [
    { name: 'IPCA', unit: '%' },
    { name: 'Selic', unit: '% a.a.' },
  ],
};

const survey = (date: string, year: string, mean: number) => ({
  Indicador: 'IPCA',
  Data: date,
  DataReferencia: year,
  Media: mean,
  Mediana: mean,
  DesvioPadrao: 0.2,
  Minimo: mean - 1,
  Maximo: mean + 1,
  numeroRespondentes: 40,
});

const ipca = [
  survey('2024-06-14', '2026', 3.6),
  survey('2024-06-14', '2024', 3.9),
  survey('2024-06-14', '2027', 3.5),
  survey('2024-06-14', '2024', 4.0),
  survey('2024-06-14', '2025', 3.7),
  survey('2024-06-07', '2024', 3.8),
];

const makeRepo = (tables: Record<string, TabularResult | 'fail'>) => {
  const requests: string[] = [];
  const repo: ExpectationsRepository = {
    getAnnualExpectations: async (indicator, limit) => {
      requests.push(`${indicator}:${String(limit)}`);
      const table = tables[indicator] ?? [];
      return table === 'fail' ? err(transportFailure()) : ok(table);
    },
  };
  return { repo, requests };
};

describe('defaultReferenceYears', () => {
  it('starts at the current year', () => {
    expect(defaultReferenceYears(utcDate(2024, 12, 31), 3)).toEqual([2024, 2025, 2026]);
  });
});

describe('latestExpectations', () => {
  it('keeps the latest survey, requested years, first row per year', () => {
    const rows = latestExpectations(ipca, columns, [2024, 2025, 2026])._unsafeUnwrap();

    expect(rows.map((row) => [row.referenceYear, row.mean])).toEqual([
      [2024, 3.9],
      [2025, 3.7],
      [2026, 3.6],
    ]);
    expect(rows[0]).toEqual({
      referenceYear: 2024,
      mean: 3.9,
      median: 3.9,
      stdDev: 0.2,
      min: 3.9 - 1,
      max: 3.9 + 1,
      respondents: 40,
      surveyDate: utcDate(2024, 6, 14),
    });
  });

  it('returns nothing when no year matches', () => {
    expect(latestExpectations(ipca, columns, [2030])._unsafeUnwrap()).toEqual([]);
  });

  it('fails without the reference year column', () => {
    const error = latestExpectations([{ Data: '2024-01-01', Media: 1, Mediana: 1 }], columns, [
      2024,
    ])._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'MalformedInputError', column: 'DataReferencia' });
  });
});

describe('getMarketExpectations', () => {
  it('skips indicators that failed or returned nothing', async () => {
    const { repo, requests } = makeRepo({ IPCA: ipca, Selic: 'fail' });

    const result = (
      await getMarketExpectations(
        { repo, catalog, logger: makeTestLogger(), now: () => utcDate(2024, 7, 1) },
        {}
      )
    )._unsafeUnwrap();

    expect(requests).toEqual(['IPCA:100', 'Selic:100']);
    expect(result).toHaveLength(1);
    expect(result[0]?.indicator).toBe('IPCA');
    expect(result[0]?.unit).toBe('%');
    expect(result[0]?.surveyDate).toEqual(utcDate(2024, 6, 14));
    expect(result[0]?.rows.map((row) => row.referenceYear)).toEqual([2024, 2025, 2026]);
  });

  it('honours explicit reference years', async () => {
    const { repo } = makeRepo({ IPCA: ipca });

    const result = (
      await getMarketExpectations(
        { repo, catalog, logger: makeTestLogger() },
        { indicators: ['IPCA'], referenceYears: [2027] }
      )
    )._unsafeUnwrap();

    expect(result[0]?.rows.map((row) => row.mean)).toEqual([3.5]);
  });

  it('rejects unknown indicators', async () => {
    const { repo } = makeRepo({});

    const result = await getMarketExpectations(
      { repo, catalog, logger: makeTestLogger() },
      { indicators: ['PIB'] }
    );

    expect(result._unsafeUnwrapErr().type).toBe('UNKNOWN_INDICATOR');
  });
});

describe('makeExpectationsRepo', () => {
  it('requests the newest surveys of one indicator', async () => {
    const client = makeFakeODataClient();

    await makeExpectationsRepo({ client, catalog }).getAnnualExpectations('IGP-M', 100);

    expect(client.queries).toEqual([
      {
        service: 'Expectativas',
        endpoint: 'ExpectativasMercadoAnuais',
        filter: "Indicador eq 'IGP-M'",
        orderBy: 'Data desc',
        top: 100,
      },
    ]);
  });
});

describe('loadExpectationsCatalog', () => {
  it('loads the bundled indicators', async () => {
    const loaded = (await loadExpectationsCatalog(path.resolve('catalogs')))._unsafeUnwrap();

    expect(loaded.indicators).toHaveLength(10);
    expect(loaded.indicators.find((indicator) => indicator.name === 'Selic')?.unit).toBe('% a.a.');
  });
});
