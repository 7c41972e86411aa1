/**
 * Download Rates Use Case
 *
 * Raw rows of several modalities within a date range, concatenated in the
 * requested order.
 */

import { err, ok, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';

import { dateColumnOf, findModality } from '../catalog.js';
import { filterByDateRange } from '../logic.js';

import type { InterestRatesError } from '../errors.js';
import type { InterestRateRepository } from '../ports.js';
import type { InterestRateCatalog } from '../types.js';
import type { Row } from '@/common/types/tabular.js';
import type { DateRange } from '@/infra/bcb/index.js';
import type { Logger } from 'pino';

export interface DownloadRatesDeps {
  repo: InterestRateRepository;
  catalog: InterestRateCatalog;
  logger: Logger;
}

export interface DownloadRatesInput {
  modalities: readonly string[];
  range: DateRange;
}

export async function downloadRates(
  deps: DownloadRatesDeps,
  input: DownloadRatesInput
): Promise<Result<Row[], InterestRatesError>> {
  const { repo, catalog, logger } = deps;
  const rows: Row[] = [];

  for (const name of input.modalities) {
    const found = findModality(catalog, name);
    if (found.isErr()) {
      return err(found.error);
    }
    const modality = found.value;

    const table = valueOrEmpty(
      await repo.getModalityRates(modality, catalog.limits.download),
      [],
      logger,
      { modality: modality.name }
    );

    const filtered = filterByDateRange(table, dateColumnOf(catalog, modality), input.range);
    if (filtered.isErr()) {
      return err(filtered.error);
    }
    rows.push(...filtered.value);
  }

  return ok(rows);
}
