/**
 * Client for the central bank's OData services (Olinda).
 *
 * Every service exposes `{base}/{service}/versao/v1/odata/{endpoint}`.
 * Parameterised endpoints take their arguments as `@Name` aliases.
 */

import { Type } from '@sinclair/typebox';

import { makeJsonGetter, type HttpOptions } from './http.js';

import type { FetchError } from '@/common/types/errors.js';
import type { CellValue, Row, TabularResult } from '@/common/types/tabular.js';
import type { Result } from 'neverthrow';

const ODataResponseSchema = Type.Object({
  value: Type.Array(
    Type.Record(
      Type.String(),
      Type.Union([Type.String(), Type.Number(), Type.Boolean(), Type.Null()])
    )
  ),
});

export interface ODataQuery {
  /** Service name, e.g. `IFDATA`, `taxaJuros`, `Expectativas` */
  service: string;
  /** Entity set or function, e.g. `IfDataValores` */
  endpoint: string;
  /** Function parameters; strings are quoted */
  parameters?: Readonly<Record<string, string | number>>;
  filter?: string;
  orderBy?: string;
  top?: number;
  select?: readonly string[];
}

export interface ODataClient {
  fetchTable(query: ODataQuery): Promise<Result<TabularResult, FetchError>>;
}

export interface ODataClientOptions extends HttpOptions {
  baseUrl: string;
}

const formatParameter = (value: string | number): string =>
  typeof value === 'number' ? String(value) : `'${value.replace(/'/g, "''")}'`;

/**
 * Quotes a string literal for use inside a `$filter` expression.
 */
export const odataString = (value: string): string => formatParameter(value);

export const buildODataUrl = (baseUrl: string, query: ODataQuery): string => {
  const parameters = Object.entries(query.parameters ?? {});
  const signature =
    parameters.length > 0
      ? `(${parameters.map(([name]) => `${name}=@${name}`).join(',')})`
      : '';

  const search: string[] = parameters.map(
    ([name, value]) => `@${name}=${encodeURIComponent(formatParameter(value))}`
  );
  if (query.filter !== undefined) search.push(`$filter=${encodeURIComponent(query.filter)}`);
  if (query.orderBy !== undefined) search.push(`$orderby=${encodeURIComponent(query.orderBy)}`);
  if (query.top !== undefined) search.push(`$top=${String(query.top)}`);
  if (query.select !== undefined && query.select.length > 0) {
    search.push(`$select=${query.select.join(',')}`);
  }
  search.push('$format=json');

  return `${baseUrl}/${query.service}/versao/v1/odata/${query.endpoint}${signature}?${search.join('&')}`;
};

const toCell = (value: string | number | boolean | null): CellValue =>
  typeof value === 'boolean' ? String(value) : value;

export const createODataClient = (options: ODataClientOptions): ODataClient => {
  const getJson = makeJsonGetter(ODataResponseSchema, options);

  return {
    async fetchTable(query) {
      const url = buildODataUrl(options.baseUrl, query);
      const result = await getJson(url);

      return result.map((payload) =>
        payload.value.map((record): Row => {
          const row: Record<string, CellValue> = {};
          for (const [column, value] of Object.entries(record)) {
            row[column] = toCell(value);
          }
          return row;
        })
      );
    },
  };
};
