/**
 * Load Latest Rates Use Case
 *
 * Fetches each requested modality and keeps the rows of its most recent
 * reference date. Modalities without data are left out.
 */

import { err, ok, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';
import { toDate } from '@/common/types/tabular.js';
import { filterLatestSnapshot } from '@/modules/snapshot/index.js';

import { dateColumnOf, findModality } from '../catalog.js';
import { shortModalityLabel } from '../logic.js';

import type { InterestRatesError } from '../errors.js';
import type { InterestRateRepository } from '../ports.js';
import type { InterestRateCatalog, ModalityDefinition, ModalitySnapshot } from '../types.js';
import type { EmptyResultError } from '@/common/types/errors.js';
import type { Logger } from 'pino';

export interface LoadLatestRatesDeps {
  repo: InterestRateRepository;
  catalog: InterestRateCatalog;
  logger: Logger;
}

export interface LoadLatestRatesInput {
  /** Modality names; defaults to every catalog modality */
  modalities?: readonly string[];
}

export async function loadLatestRates(
  deps: LoadLatestRatesDeps,
  input: LoadLatestRatesInput = {}
): Promise<Result<ModalitySnapshot[], InterestRatesError | EmptyResultError>> {
  const { repo, catalog, logger } = deps;

  const definitions: ModalityDefinition[] = [];
  for (const name of input.modalities ?? catalog.modalities.map((modality) => modality.name)) {
    const found = findModality(catalog, name);
    if (found.isErr()) {
      return err(found.error);
    }
    definitions.push(found.value);
  }

  const tables = await Promise.all(
    definitions.map(async (modality) =>
      valueOrEmpty(
        await repo.getModalityRates(modality, catalog.limits.latest),
        [],
        logger,
        { modality: modality.name }
      )
    )
  );

  const snapshots: ModalitySnapshot[] = [];
  for (const [index, modality] of definitions.entries()) {
    const table = tables[index] ?? [];
    if (table.length === 0) continue;

    const dateColumn = dateColumnOf(catalog, modality);
    const latest = filterLatestSnapshot(table, dateColumn);
    if (latest.isErr()) {
      return err(latest.error);
    }

    const first = latest.value[0];
    snapshots.push({
      modality: modality.name,
      shortLabel: shortModalityLabel(modality.name, catalog.shortLabels),
      referenceDate: first === undefined ? null : toDate(first[dateColumn]),
      rows: latest.value,
    });
  }

  logger.debug(
    { requested: definitions.length, loaded: snapshots.length },
    'Loaded latest interest-rate snapshots'
  );
  return ok(snapshots);
}
