/**
 * Market-expectations repository over the Expectativas OData service.
 */

import { odataString, type ODataClient } from '@/infra/bcb/index.js';

import type { ExpectationsRepository } from '../../core/ports.js';
import type { ExpectationsCatalog } from '../../core/types.js';

export interface ExpectationsRepoDeps {
  client: ODataClient;
  catalog: ExpectationsCatalog;
}

export const makeExpectationsRepo = (deps: ExpectationsRepoDeps): ExpectationsRepository => {
  const { client, catalog } = deps;

  return {
    getAnnualExpectations(indicator, limit) {
      return client.fetchTable({
        service: catalog.service,
        endpoint: catalog.endpoint,
        filter: `${catalog.columns.indicator} eq ${odataString(indicator)}`,
        orderBy: `${catalog.columns.surveyDate} desc`,
        top: limit,
      });
    },
  };
};
