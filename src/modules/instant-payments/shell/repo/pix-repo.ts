/**
 * Pix repository over the SPI OData service.
 */

import { formatIsoDate } from '@/common/types/temporal.js';

import { PIX_COLUMNS } from '../../core/types.js';

import type { PixRepository } from '../../core/ports.js';
import type { ODataClient } from '@/infra/bcb/index.js';

const SERVICE = 'SPI';
const ENDPOINT = 'PixLiquidadosAtual';

export interface PixRepoDeps {
  client: ODataClient;
}

export const makePixRepo = (deps: PixRepoDeps): PixRepository => {
  const { client } = deps;

  return {
    getSettledSince(start) {
      return client.fetchTable({
        service: SERVICE,
        endpoint: ENDPOINT,
        select: Object.values(PIX_COLUMNS),
        filter: `${PIX_COLUMNS.date} ge ${formatIsoDate(start)}`,
        orderBy: `${PIX_COLUMNS.date} asc`,
      });
    },
  };
};
