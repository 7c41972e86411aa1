/**
 * Delinquency repository over the SGS regional non-performing loan series.
 */

import { ok } from 'neverthrow';

import { sgsCodeOf } from '../../core/catalog.js';

import type { DelinquencyRepository } from '../../core/ports.js';
import type { DelinquencyCatalog } from '../../core/types.js';
import type { Series } from '@/common/types/series.js';
import type { SgsClient } from '@/infra/bcb/index.js';

export interface DelinquencyRepoDeps {
  client: SgsClient;
  catalog: DelinquencyCatalog;
}

const NO_SERIES: Series = [];

export const makeDelinquencyRepo = (deps: DelinquencyRepoDeps): DelinquencyRepository => {
  const { client, catalog } = deps;

  return {
    async getLast(location, mode, count) {
      const code = sgsCodeOf(catalog, location, mode);
      if (code === null) return ok(NO_SERIES);
      return client.fetchLast(code, count);
    },

    async getSeries(location, mode, range) {
      const code = sgsCodeOf(catalog, location, mode);
      if (code === null) return ok(NO_SERIES);
      return client.fetchSeries(code, range);
    },
  };
};
