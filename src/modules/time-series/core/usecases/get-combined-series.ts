/**
 * Get Combined Series Use Case
 *
 * Fetches every selected series over the range, resamples them, joins them
 * on a common date index with forward fill and splits the chart columns
 * between two axes when their magnitudes differ too much.
 */

import { err, ok, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';
import { partitionAxes } from '@/modules/chart-axis/index.js';
import { alignSeries, resampleSeries } from '@/modules/series/index.js';

import {
  createInvalidDateRangeError,
  createNoSeriesSelectedError,
  type TimeSeriesError,
} from '../errors.js';
import { CHART_SERIES_LIMIT, seriesColumnName, seriesWarnings } from '../logic.js';

import type { SeriesSource } from '../ports.js';
import type {
  CombinedSeries,
  CombinedSeriesInput,
  SeriesCatalog,
  SeriesSelection,
} from '../types.js';
import type { Series } from '@/common/types/series.js';
import type { Logger } from 'pino';

export interface GetCombinedSeriesDeps {
  source: SeriesSource;
  catalog: SeriesCatalog;
  logger: Logger;
}

export async function getCombinedSeries(
  deps: GetCombinedSeriesDeps,
  input: CombinedSeriesInput
): Promise<Result<CombinedSeries, TimeSeriesError>> {
  const { source, catalog, logger } = deps;
  const { range } = input;

  if (input.selections.length === 0) {
    return err(createNoSeriesSelectedError());
  }
  if (range.end.getTime() < range.start.getTime()) {
    return err(createInvalidDateRangeError('The end date is before the start date'));
  }

  // One column per code; the first selection of a code names it
  const selections: SeriesSelection[] = [];
  for (const selection of input.selections) {
    if (!selections.some((chosen) => chosen.code === selection.code)) {
      selections.push(selection);
    }
  }

  const fetched = await Promise.all(
    selections.map(async (selection) =>
      valueOrEmpty(await source.fetchSeries(selection.code, range), [], logger, {
        code: selection.code,
      })
    )
  );

  const columns = selections.map(seriesColumnName);
  const seriesByColumn: Record<string, Series> = {};
  columns.forEach((column, index) => {
    seriesByColumn[column] = resampleSeries(fetched[index] ?? [], input.resample);
  });

  // Bare-code columns are integer-like keys, which objects enumerate first
  const table = { ...alignSeries(seriesByColumn), columns };
  const chartColumns = table.columns.slice(0, CHART_SERIES_LIMIT);

  logger.debug(
    { codes: selections.map((selection) => selection.code), rows: table.rows.length },
    'Combined series assembled'
  );

  return ok({
    table,
    chartColumns,
    axes: partitionAxes(table, chartColumns),
    warnings: seriesWarnings(catalog, selections, range),
  });
}
