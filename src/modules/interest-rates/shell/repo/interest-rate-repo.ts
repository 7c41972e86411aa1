/**
 * Interest-rate repository over the taxaJuros OData service.
 */

import { odataString, type ODataClient } from '@/infra/bcb/index.js';

import type { InterestRateRepository } from '../../core/ports.js';
import type { InterestRateCatalog } from '../../core/types.js';

export interface InterestRateRepoDeps {
  client: ODataClient;
  catalog: InterestRateCatalog;
}

export const makeInterestRateRepo = (deps: InterestRateRepoDeps): InterestRateRepository => {
  const { client, catalog } = deps;

  return {
    getModalityRates(modality, limit) {
      const { endpoint, dateColumn } = catalog.endpoints[modality.frequency];
      return client.fetchTable({
        service: catalog.service,
        endpoint,
        filter: `${catalog.columns.modality} eq ${odataString(modality.name)}`,
        orderBy: `${dateColumn} desc`,
        top: limit,
      });
    },
  };
};
