import { describe, expect, it } from 'vitest';

import { makeIfDataRepo } from '@/modules/institutions/index.js';

import { makeFakeODataClient } from '../../fixtures/fakes.js';

describe('makeIfDataRepo', () => {
  it('queries the registry of a period', async () => {
    const registry = [{ CodInst: 'C1', NomeInstituicao: 'BANCO - PRUDENCIAL', Sr: 'S1' }];
    const client = makeFakeODataClient({ tables: { 'IFDATA/IfDataCadastro': registry } });
    const repo = makeIfDataRepo({ client });

    const result = await repo.getRegistry(202403);

    expect(result._unsafeUnwrap()).toEqual(registry);
    expect(client.queries).toEqual([
      { service: 'IFDATA', endpoint: 'IfDataCadastro', parameters: { AnoMes: 202403 } },
    ]);
  });

  it('queries prudential conglomerate values by report number', async () => {
    const client = makeFakeODataClient();
    const repo = makeIfDataRepo({ client });

    await repo.getReport(202312, 'summary');
    await repo.getReport(202312, 'assets');

    expect(client.queries.map((query) => query.parameters)).toEqual([
      { AnoMes: 202312, TipoInstituicao: 1, Relatorio: '1' },
      { AnoMes: 202312, TipoInstituicao: 1, Relatorio: '2' },
    ]);
    expect(client.queries[0]?.endpoint).toBe('IfDataValores');
  });
});
