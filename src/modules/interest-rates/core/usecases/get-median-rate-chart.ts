/**
 * Get Median Rate Chart Use Case
 *
 * Median rate across institutions for each reference date of a modality,
 * over the last `years` years.
 */

import { err, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';

import { dateColumnOf, findModality } from '../catalog.js';
import { medianRateByDate, shortModalityLabel } from '../logic.js';

import type { InterestRatesError } from '../errors.js';
import type { InterestRateRepository } from '../ports.js';
import type { InterestRateCatalog, MedianRateChart } from '../types.js';
import type { Logger } from 'pino';

export const DEFAULT_CHART_YEARS = 10;

export interface GetMedianRateChartDeps {
  repo: InterestRateRepository;
  catalog: InterestRateCatalog;
  logger: Logger;
  now?: () => Date;
}

export interface GetMedianRateChartInput {
  modality: string;
  years?: number;
}

export async function getMedianRateChart(
  deps: GetMedianRateChartDeps,
  input: GetMedianRateChartInput
): Promise<Result<MedianRateChart, InterestRatesError>> {
  const { repo, catalog, logger } = deps;

  const found = findModality(catalog, input.modality);
  if (found.isErr()) {
    return err(found.error);
  }
  const modality = found.value;

  const today = (deps.now ?? (() => new Date()))();
  const since = new Date(today.getTime());
  since.setUTCFullYear(today.getUTCFullYear() - (input.years ?? DEFAULT_CHART_YEARS));

  const rows = valueOrEmpty(
    await repo.getModalityRates(modality, catalog.limits.history),
    [],
    logger,
    { modality: modality.name }
  );

  return medianRateByDate(rows, dateColumnOf(catalog, modality), catalog.columns.rate, since).map(
    ({ observations, series }) => ({
      modality: modality.name,
      shortLabel: shortModalityLabel(modality.name, catalog.shortLabels),
      observations,
      series,
    })
  );
}
