import { describe, expect, it, vi } from 'vitest';

import { buildODataUrl, createODataClient, odataString, type FetchFn } from '@/infra/bcb/index.js';

import { makeTestLogger } from '../../../fixtures/builders.js';

const BASE = 'https://odata.test/olinda/servico';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

describe('buildODataUrl', () => {
  it('passes parameters as aliases', () => {
    const url = buildODataUrl(BASE, {
      service: 'IFDATA',
      endpoint: 'IfDataValores',
      parameters: { AnoMes: 202403, TipoInstituicao: 1, Relatorio: '1' },
    });

    expect(url).toBe(
      `${BASE}/IFDATA/versao/v1/odata/IfDataValores(AnoMes=@AnoMes,TipoInstituicao=@TipoInstituicao,Relatorio=@Relatorio)` +
        `?@AnoMes=202403&@TipoInstituicao=1&@Relatorio='1'&$format=json`
    );
  });

  it('encodes query options', () => {
    const url = buildODataUrl(BASE, {
      service: 'taxaJuros',
      endpoint: 'TaxasJurosMensalPorMes',
      filter: `Modalidade eq ${odataString('Cheque especial')}`,
      orderBy: 'Mes desc',
      top: 10,
      select: ['Mes', 'TaxaJurosAoAno'],
    });

    expect(url).toBe(
      `${BASE}/taxaJuros/versao/v1/odata/TaxasJurosMensalPorMes` +
        `?$filter=Modalidade%20eq%20'Cheque%20especial'&$orderby=Mes%20desc&$top=10` +
        `&$select=Mes,TaxaJurosAoAno&$format=json`
    );
  });
});

describe('odataString', () => {
  it('doubles embedded quotes', () => {
    expect(odataString("D'Ouro")).toBe("'D''Ouro'");
  });
});

describe('createODataClient', () => {
  const query = { service: 'Expectativas', endpoint: 'ExpectativasMercadoAnuais' };

  it('returns the value rows', async () => {
    const fetchFn = vi.fn<FetchFn>(async () =>
      jsonResponse({ value: [{ Indicador: 'IPCA', Media: 4.1, Ativo: true, Nota: null }] })
    );
    const client = createODataClient({
      baseUrl: BASE,
      timeoutMs: 1000,
      logger: makeTestLogger(),
      fetchFn,
    });

    const result = await client.fetchTable(query);

    expect(result._unsafeUnwrap()).toEqual([
      { Indicador: 'IPCA', Media: 4.1, Ativo: 'true', Nota: null },
    ]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      `${BASE}/Expectativas/versao/v1/odata/ExpectativasMercadoAnuais?$format=json`
    );
  });

  it('maps error statuses to HttpError', async () => {
    const client = createODataClient({
      baseUrl: BASE,
      timeoutMs: 1000,
      logger: makeTestLogger(),
      fetchFn: async () => jsonResponse({ message: 'down' }, 503),
    });

    const error = (await client.fetchTable(query))._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'HttpError', status: 503 });
  });

  it('rejects payloads of the wrong shape', async () => {
    const client = createODataClient({
      baseUrl: BASE,
      timeoutMs: 1000,
      logger: makeTestLogger(),
      fetchFn: async () => jsonResponse({ items: [] }),
    });

    const error = (await client.fetchTable(query))._unsafeUnwrapErr();

    expect(error.type).toBe('ResponseValidationError');
  });

  it('rejects bodies that are not JSON', async () => {
    const client = createODataClient({
      baseUrl: BASE,
      timeoutMs: 1000,
      logger: makeTestLogger(),
      fetchFn: async () => new Response('<html>', { status: 200 }),
    });

    const error = (await client.fetchTable(query))._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'ResponseValidationError' });
    expect(error.message).toBe(
      `Response from ${BASE}/Expectativas/versao/v1/odata/ExpectativasMercadoAnuais?$format=json is not valid JSON`
    );
  });

  it('maps transport failures to NetworkError', async () => {
    const client = createODataClient({
      baseUrl: BASE,
      timeoutMs: 1000,
      logger: makeTestLogger(),
      fetchFn: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const error = (await client.fetchTable(query))._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'NetworkError', retryable: true });
  });

  it('maps aborted requests to TimeoutError', async () => {
    const client = createODataClient({
      baseUrl: BASE,
      timeoutMs: 5,
      logger: makeTestLogger(),
      fetchFn: async () => {
        throw Object.assign(new Error('The operation was aborted due to timeout'), {
          name: 'TimeoutError',
        });
      },
    });

    const error = (await client.fetchTable(query))._unsafeUnwrapErr();

    expect(error.type).toBe('TimeoutError');
  });
});
