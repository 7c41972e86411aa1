import { describe, expect, it } from 'vitest';

import { utcDate } from '@/common/types/temporal.js';
import { filterLatestSnapshot, latestValue } from '@/modules/snapshot/index.js';

const table = [
  { Data: utcDate(2024, 5, 1), InstituicaoFinanceira: 'Banco A', TaxaJurosAoMes: 2.1 },
  { Data: utcDate(2024, 5, 8), InstituicaoFinanceira: 'Banco A', TaxaJurosAoMes: 2.3 },
  { Data: utcDate(2024, 5, 8), InstituicaoFinanceira: 'Banco B', TaxaJurosAoMes: 1.9 },
  { Data: utcDate(2024, 4, 24), InstituicaoFinanceira: 'Banco C', TaxaJurosAoMes: 3.0 },
];

describe('filterLatestSnapshot', () => {
  it('keeps every row at the most recent date', () => {
    const result = filterLatestSnapshot(table, 'Data');

    expect(result._unsafeUnwrap().map((row) => row['InstituicaoFinanceira'])).toEqual([
      'Banco A',
      'Banco B',
    ]);
  });

  it('keeps the rows at a target date', () => {
    const result = filterLatestSnapshot(table, 'Data', { target: utcDate(2024, 5, 1) });

    expect(result._unsafeUnwrap()).toEqual([table[0]]);
  });

  it('compares string dates chronologically', () => {
    const rows = [
      { Data: '2024-05-10', Mediana: 3.9 },
      { Data: '2024-05-03', Mediana: 3.8 },
    ];

    expect(filterLatestSnapshot(rows, 'Data')._unsafeUnwrap()).toEqual([rows[0]]);
  });

  it('compares numeric year-months', () => {
    const rows = [
      { AnoMes: 202309, Saldo: 1 },
      { AnoMes: 202312, Saldo: 2 },
    ];

    expect(filterLatestSnapshot(rows, 'AnoMes')._unsafeUnwrap()).toEqual([rows[1]]);
  });

  it('returns an empty table unchanged', () => {
    const empty: never[] = [];

    expect(filterLatestSnapshot(empty, 'Data')._unsafeUnwrap()).toBe(empty);
  });

  it('fails on an empty table when a non-empty result is required', () => {
    const result = filterLatestSnapshot([], 'Data', { requireNonEmpty: true });

    expect(result._unsafeUnwrapErr().type).toBe('EmptyResultError');
  });

  it('returns no rows when the target date is absent', () => {
    const result = filterLatestSnapshot(table, 'Data', { target: utcDate(2020, 1, 1) });

    expect(result._unsafeUnwrap()).toEqual([]);
  });

  it('fails when a required target date is absent from a non-empty table', () => {
    const result = filterLatestSnapshot(table, 'Data', {
      target: utcDate(2020, 1, 1),
      requireNonEmpty: true,
    });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'EmptyResultError',
      context: "latest snapshot of 'Data'",
    });
  });

  it('fails when the date column is missing', () => {
    const result = filterLatestSnapshot(table, 'DataReferencia');

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'MalformedInputError',
      message: "Column 'DataReferencia' is missing from latest snapshot filter",
      column: 'DataReferencia',
      context: 'latest snapshot filter',
    });
  });
});

describe('latestValue', () => {
  it('skips trailing missing observations', () => {
    const series = [
      { date: utcDate(2024, 1, 1), value: 1 },
      { date: utcDate(2024, 2, 1), value: 2 },
      { date: utcDate(2024, 3, 1), value: null },
    ];

    expect(latestValue(series)).toEqual({ date: utcDate(2024, 2, 1), value: 2 });
  });

  it('returns null for an empty series', () => {
    expect(latestValue([])).toBeNull();
  });
});
