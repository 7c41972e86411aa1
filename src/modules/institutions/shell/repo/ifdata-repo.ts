/**
 * IF.Data repository over the Olinda OData service.
 */

import { IFDATA_REPORTS } from '../../core/types.js';

import type { IfDataRepository } from '../../core/ports.js';
import type { ODataClient } from '@/infra/bcb/index.js';

const SERVICE = 'IFDATA';

/** TipoInstituicao=1: prudential conglomerates */
const PRUDENTIAL_CONGLOMERATES = 1;

export interface IfDataRepoDeps {
  client: ODataClient;
}

export const makeIfDataRepo = (deps: IfDataRepoDeps): IfDataRepository => {
  const { client } = deps;

  return {
    getRegistry(period) {
      return client.fetchTable({
        service: SERVICE,
        endpoint: 'IfDataCadastro',
        parameters: { AnoMes: period },
      });
    },

    getReport(period, report) {
      return client.fetchTable({
        service: SERVICE,
        endpoint: 'IfDataValores',
        parameters: {
          AnoMes: period,
          TipoInstituicao: PRUDENTIAL_CONGLOMERATES,
          Relatorio: String(IFDATA_REPORTS[report].code),
        },
      });
    },
  };
};
