import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { utcDate } from '@/common/types/temporal.js';
import {
  downloadRates,
  getBankRateProfile,
  getMedianRateChart,
  getRateRankings,
  listRateInstitutions,
  loadInterestRateCatalog,
  loadLatestRates,
  makeInterestRateRepo,
  type InterestRateCatalog,
} from '@/modules/interest-rates/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';
import { makeFakeInterestRateRepo, makeFakeODataClient } from '../../fixtures/fakes.js';

const VEHICLES = 'Aquisição de veículos - Prefixado';
const OVERDRAFT = 'Cheque especial - Prefixado';
const MORTGAGE = 'Financiamento imobiliário com taxas de mercado - Prefixado';

const catalog: InterestRateCatalog = {
  service: 'taxaJuros',
  endpoints: {
    daily: { endpoint: 'TaxasJurosDiariaPorInicioPeriodo', dateColumn: 'InicioPeriodo' },
    monthly: { endpoint: 'TaxasJurosMensalPorMes', dateColumn: 'Mes' },
  },
  columns: { modality: 'Modalidade', institution: 'InstituicaoFinanceira', rate: 'TaxaJurosAoAno' },
  limits: { latest: 50, history: 500, download: 100 },
  shortLabels: [{ from: ' - Prefixado', to: ' - Pré' }],
  modalities: [
    { name: VEHICLES, frequency: 'daily', ranked: true },
    { name: OVERDRAFT, frequency: 'daily', ranked: true },
    { name: MORTGAGE, frequency: 'monthly', ranked: false },
  ],
};

const vehicles = [
  { InicioPeriodo: '2024-03-04', InstituicaoFinanceira: 'BANCO A', TaxaJurosAoAno: 22 },
  { InicioPeriodo: '2024-03-04', InstituicaoFinanceira: 'BANCO B', TaxaJurosAoAno: 18 },
  { InicioPeriodo: '2024-02-26', InstituicaoFinanceira: 'BANCO A', TaxaJurosAoAno: 21 },
];

const mortgage = [
  { Mes: '2024-02-01', InstituicaoFinanceira: 'BANCO B', TaxaJurosAoAno: 11 },
  { Mes: '2024-02-01', InstituicaoFinanceira: 'BANCO C', TaxaJurosAoAno: 0 },
];

const load = async () => {
  const repo = makeFakeInterestRateRepo({
    tables: { [VEHICLES]: vehicles, [MORTGAGE]: mortgage },
    failing: [OVERDRAFT],
  });
  const result = await loadLatestRates({ repo, catalog, logger: makeTestLogger() });
  return { repo, snapshots: result._unsafeUnwrap() };
};

describe('loadLatestRates', () => {
  it('keeps the latest date of each modality with data', async () => {
    const { repo, snapshots } = await load();

    expect(repo.requests).toEqual([
      { modality: VEHICLES, limit: 50 },
      { modality: OVERDRAFT, limit: 50 },
      { modality: MORTGAGE, limit: 50 },
    ]);
    expect(snapshots.map((snapshot) => [snapshot.shortLabel, snapshot.rows.length])).toEqual([
      ['Aquisição de veículos - Pré', 2],
      ['Financiamento imobiliário com taxas de mercado - Pré', 2],
    ]);
    expect(snapshots[0]?.referenceDate).toEqual(utcDate(2024, 3, 4));
  });

  it('rejects modalities outside the catalog', async () => {
    const repo = makeFakeInterestRateRepo();

    const result = await loadLatestRates(
      { repo, catalog, logger: makeTestLogger() },
      { modalities: ['Leasing'] }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'UNKNOWN_MODALITY',
      modality: 'Leasing',
      message: "Modality 'Leasing' is not in the catalog",
    });
    expect(repo.requests).toEqual([]);
  });
});

describe('getRateRankings', () => {
  it('ranks only the ranked modalities that have data', async () => {
    const { snapshots } = await load();

    const rankings = getRateRankings({ catalog, topN: 10 }, { snapshots })._unsafeUnwrap();

    expect(rankings).toHaveLength(1);
    expect(rankings[0]?.modality).toBe(VEHICLES);
    expect(rankings[0]?.largest.map((row) => row.entityId)).toEqual(['BANCO A', 'BANCO B']);
    expect(rankings[0]?.smallest.map((row) => row.entityId)).toEqual(['BANCO B', 'BANCO A']);
  });
});

describe('getBankRateProfile', () => {
  it('lists every modality the institution operates in', async () => {
    const { snapshots } = await load();

    const profile = getBankRateProfile(
      { catalog },
      { snapshots, institution: 'BANCO B' }
    )._unsafeUnwrap();

    expect(profile.entries).toEqual([
      {
        modality: VEHICLES,
        shortLabel: 'Aquisição de veículos - Pré',
        rate: 18,
        formattedRate: '18,00',
        position: { rank: 1, total: 2 },
      },
      {
        modality: MORTGAGE,
        shortLabel: 'Financiamento imobiliário com taxas de mercado - Pré',
        rate: 11,
        formattedRate: '11,00',
        position: { rank: 2, total: 2 },
      },
    ]);
    expect(listRateInstitutions({ catalog }, snapshots)).toEqual(['BANCO A', 'BANCO B', 'BANCO C']);
  });
});

describe('getMedianRateChart', () => {
  it('uses the history limit and the modality date column', async () => {
    const repo = makeFakeInterestRateRepo({ tables: { [MORTGAGE]: mortgage } });

    const chart = (
      await getMedianRateChart(
        { repo, catalog, logger: makeTestLogger(), now: () => utcDate(2024, 6, 1) },
        { modality: MORTGAGE }
      )
    )._unsafeUnwrap();

    expect(repo.requests).toEqual([{ modality: MORTGAGE, limit: 500 }]);
    expect(chart.observations).toBe(2);
    expect(chart.series).toEqual([{ date: utcDate(2024, 2, 1), value: 5.5 }]);
  });

  it('returns an empty chart when the fetch fails', async () => {
    const repo = makeFakeInterestRateRepo({ failing: [VEHICLES] });

    const chart = (
      await getMedianRateChart({ repo, catalog, logger: makeTestLogger() }, { modality: VEHICLES })
    )._unsafeUnwrap();

    expect(chart.series).toEqual([]);
    expect(chart.observations).toBe(0);
  });
});

describe('downloadRates', () => {
  it('concatenates the rows of each modality inside the range', async () => {
    const repo = makeFakeInterestRateRepo({
      tables: { [VEHICLES]: vehicles, [MORTGAGE]: mortgage },
    });

    const rows = (
      await downloadRates(
        { repo, catalog, logger: makeTestLogger() },
        {
          modalities: [MORTGAGE, VEHICLES],
          range: { start: utcDate(2024, 2, 1), end: utcDate(2024, 2, 29) },
        }
      )
    )._unsafeUnwrap();

    expect(rows).toEqual([...mortgage, vehicles[2]]);
    expect(repo.requests.map((request) => request.limit)).toEqual([100, 100]);
  });
});

describe('makeInterestRateRepo', () => {
  it('filters by modality and orders by the endpoint date column', async () => {
    const client = makeFakeODataClient();
    const repo = makeInterestRateRepo({ client, catalog });

    await repo.getModalityRates({ name: MORTGAGE, frequency: 'monthly', ranked: false }, 10);

    expect(client.queries).toEqual([
      {
        service: 'taxaJuros',
        endpoint: 'TaxasJurosMensalPorMes',
        filter: `Modalidade eq '${MORTGAGE}'`,
        orderBy: 'Mes desc',
        top: 10,
      },
    ]);
  });
});

describe('loadInterestRateCatalog', () => {
  it('loads the bundled modality catalog', async () => {
    const loaded = (await loadInterestRateCatalog(path.resolve('catalogs')))._unsafeUnwrap();

    expect(loaded.modalities).toHaveLength(14);
    expect(loaded.modalities.filter((modality) => modality.ranked)).toHaveLength(8);
    expect(loaded.endpoints.daily.dateColumn).toBe('InicioPeriodo');
  });
});
