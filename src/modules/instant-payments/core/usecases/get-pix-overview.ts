/**
 * Get Pix Overview Use Case
 *
 * Settlement days of a date range with their totals, per-metric statistics
 * and a comparison of two sub-periods (by default the two halves of the
 * range).
 */

import { err, ok, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';

import {
  comparePeriods,
  computeKpis,
  defaultComparisonPeriods,
  filterDays,
  parsePixDays,
  summarizeMetrics,
  validatePeriod,
} from '../logic.js';
import { PIX_LAUNCH_DATE, type PixOverview } from '../types.js';

import type { InstantPaymentsError } from '../errors.js';
import type { PixRepository } from '../ports.js';
import type { DateRange } from '@/infra/bcb/index.js';
import type { Logger } from 'pino';

export interface GetPixOverviewDeps {
  repo: PixRepository;
  logger: Logger;
}

export interface GetPixOverviewInput {
  range: DateRange;
  periodA?: DateRange;
  periodB?: DateRange;
}

export async function getPixOverview(
  deps: GetPixOverviewDeps,
  input: GetPixOverviewInput
): Promise<Result<PixOverview, InstantPaymentsError>> {
  const { repo, logger } = deps;

  const range = validatePeriod(input.range, 'Range');
  if (range.isErr()) {
    return err(range.error);
  }

  const defaults = defaultComparisonPeriods(input.range);
  const periodA = validatePeriod(input.periodA ?? defaults.periodA, 'Period A');
  if (periodA.isErr()) {
    return err(periodA.error);
  }
  const periodB = validatePeriod(input.periodB ?? defaults.periodB, 'Period B');
  if (periodB.isErr()) {
    return err(periodB.error);
  }

  const since = input.range.start < PIX_LAUNCH_DATE ? PIX_LAUNCH_DATE : input.range.start;
  const table = valueOrEmpty(await repo.getSettledSince(since), [], logger, {
    since: since.toISOString(),
  });

  const parsed = parsePixDays(table);
  if (parsed.isErr()) {
    return err(parsed.error);
  }
  const days = filterDays(parsed.value, input.range);

  logger.debug({ days: days.length }, 'Pix settlement days loaded');

  return ok({
    range: input.range,
    days,
    kpis: computeKpis(days),
    statistics: summarizeMetrics(days),
    comparison: comparePeriods(days, periodA.value, periodB.value),
  });
}
