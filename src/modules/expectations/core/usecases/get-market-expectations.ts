/**
 * Get Market Expectations Use Case
 *
 * For each indicator: fetch the latest survey rows, keep the most recent
 * survey date and the requested reference years. Indicators without rows
 * are left out.
 */

import { err, ok, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';

import { findIndicator } from '../catalog.js';
import { defaultReferenceYears, latestExpectations } from '../logic.js';

import type { ExpectationsError } from '../errors.js';
import type { ExpectationsRepository } from '../ports.js';
import type { ExpectationsCatalog, IndicatorDefinition, IndicatorExpectations } from '../types.js';
import type { EmptyResultError } from '@/common/types/errors.js';
import type { Logger } from 'pino';

export interface GetMarketExpectationsDeps {
  repo: ExpectationsRepository;
  catalog: ExpectationsCatalog;
  logger: Logger;
  now?: () => Date;
}

export interface GetMarketExpectationsInput {
  /** Indicator names; defaults to the whole catalog */
  indicators?: readonly string[];
  /** Defaults to the current year and the following ones */
  referenceYears?: readonly number[];
}

export async function getMarketExpectations(
  deps: GetMarketExpectationsDeps,
  input: GetMarketExpectationsInput = {}
): Promise<Result<IndicatorExpectations[], ExpectationsError | EmptyResultError>> {
  const { repo, catalog, logger } = deps;

  const indicators: IndicatorDefinition[] = [];
  for (const name of input.indicators ?? catalog.indicators.map((indicator) => indicator.name)) {
    const found = findIndicator(catalog, name);
    if (found.isErr()) {
      return err(found.error);
    }
    indicators.push(found.value);
  }

  const today = (deps.now ?? (() => new Date()))();
  const years = input.referenceYears ?? defaultReferenceYears(today, catalog.referenceYearCount);

  const tables = await Promise.all(
    indicators.map(async (indicator) =>
      valueOrEmpty(
        await repo.getAnnualExpectations(indicator.name, catalog.limit),
        [],
        logger,
        { indicator: indicator.name }
      )
    )
  );

  const results: IndicatorExpectations[] = [];
  for (const [index, indicator] of indicators.entries()) {
    const rows = latestExpectations(tables[index] ?? [], catalog.columns, years);
    if (rows.isErr()) {
      return err(rows.error);
    }
    if (rows.value.length === 0) continue;

    results.push({
      indicator: indicator.name,
      unit: indicator.unit,
      surveyDate: rows.value[0]?.surveyDate ?? null,
      rows: rows.value,
    });
  }

  return ok(results);
}
