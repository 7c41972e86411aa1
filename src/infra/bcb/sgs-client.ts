/**
 * Client for the SGS time-series API (`bcdata.sgs.{code}/dados`).
 * Dates travel as dd/MM/yyyy and values as decimal strings.
 */

import { Type } from '@sinclair/typebox';

import { utcDate } from '@/common/types/temporal.js';

import { makeJsonGetter, type HttpOptions } from './http.js';

import type { FetchError } from '@/common/types/errors.js';
import type { Series, SeriesPoint } from '@/common/types/series.js';
import type { Result } from 'neverthrow';

const SgsResponseSchema = Type.Array(
  Type.Object({
    data: Type.String(),
    valor: Type.Union([Type.String(), Type.Number(), Type.Null()]),
  })
);

export interface DateRange {
  start: Date;
  end: Date;
}

export interface SgsClient {
  fetchSeries(code: number, range: DateRange): Promise<Result<Series, FetchError>>;
  fetchLast(code: number, count: number): Promise<Result<Series, FetchError>>;
}

export interface SgsClientOptions extends HttpOptions {
  baseUrl: string;
}

const pad = (n: number): string => String(n).padStart(2, '0');

export const formatSgsDate = (date: Date): string =>
  `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${String(date.getUTCFullYear())}`;

export const parseSgsDate = (text: string): Date | null => {
  const match = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(text.trim());
  if (match === null) return null;
  const [, day, month, year] = match;
  return utcDate(Number(year), Number(month), Number(day));
};

const parseValue = (valor: string | number | null): number | null => {
  if (valor === null) return null;
  if (typeof valor === 'string' && valor.trim() === '') return null;
  const parsed = typeof valor === 'number' ? valor : Number(valor.trim());
  return Number.isFinite(parsed) ? parsed : null;
};

export const createSgsClient = (options: SgsClientOptions): SgsClient => {
  const getJson = makeJsonGetter(SgsResponseSchema, options);

  const toSeries = (records: { data: string; valor: string | number | null }[]): Series => {
    const points: SeriesPoint[] = [];
    for (const record of records) {
      const date = parseSgsDate(record.data);
      if (date !== null) {
        points.push({ date, value: parseValue(record.valor) });
      }
    }
    return points.sort((a, b) => a.date.getTime() - b.date.getTime());
  };

  return {
    async fetchSeries(code, range) {
      const url =
        `${options.baseUrl}/bcdata.sgs.${String(code)}/dados?formato=json` +
        `&dataInicial=${formatSgsDate(range.start)}&dataFinal=${formatSgsDate(range.end)}`;
      return (await getJson(url)).map(toSeries);
    },

    async fetchLast(code, count) {
      const url = `${options.baseUrl}/bcdata.sgs.${String(code)}/dados/ultimos/${String(count)}?formato=json`;
      return (await getJson(url)).map(toSeries);
    },
  };
};
