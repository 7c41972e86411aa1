/**
 * Time Series Module - Pure Functions
 */

import { err, ok, type Result } from 'neverthrow';

import {
  linearTrend,
  mean,
  median,
  pearsonCorrelation,
  quantile,
  sampleStd,
  type LinearTrend,
  type Point,
} from '@/modules/statistics/index.js';

import { createUnknownColumnError, type UnknownColumnError } from './errors.js';

import type {
  CorrelationMatrix,
  SeriesCatalog,
  SeriesDefinition,
  SeriesDescription,
  SeriesSelection,
  SeriesWarning,
} from './types.js';
import type { Frequency } from '@/common/types/temporal.js';
import type { DateRange } from '@/infra/bcb/index.js';
import type { AlignedTable } from '@/modules/series/index.js';

/** Shortest query the catalog search answers */
export const MIN_SEARCH_LENGTH = 2;

/** Ranges longer than this are slow to fetch for daily series */
export const LONG_RANGE_DAYS = 3650;

/** Series drawn together on the combined chart */
export const CHART_SERIES_LIMIT = 3;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Catalog series whose name, description or code contains the query
 * (case-insensitive), in catalog order.
 */
export function searchCatalog(catalog: SeriesCatalog, query: string): SeriesDefinition[] {
  const needle = query.trim().toLowerCase();
  if (needle.length < MIN_SEARCH_LENGTH) {
    return [];
  }

  return catalog.categories
    .flatMap((category) => category.series)
    .filter(
      (series) =>
        series.name.toLowerCase().includes(needle) ||
        series.description.toLowerCase().includes(needle) ||
        String(series.code).includes(needle)
    );
}

/**
 * Comma-separated SGS codes. Parts that are not plain digits are ignored,
 * repeated codes kept once.
 */
export function parseSeriesCodes(text: string): number[] {
  const codes: number[] = [];
  for (const part of text.split(',')) {
    const trimmed = part.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    const code = Number(trimmed);
    if (code > 0 && !codes.includes(code)) {
      codes.push(code);
    }
  }
  return codes;
}

/**
 * Selections for codes, named after the catalog entry when there is one.
 */
export const selectionsForCodes = (
  catalog: SeriesCatalog,
  codes: readonly number[]
): SeriesSelection[] =>
  codes.map((code) => ({ code, name: catalog.byCode.get(code)?.name ?? '' }));

/**
 * `{code}_{name}`, or the bare code when the name is blank.
 */
export function seriesColumnName(selection: SeriesSelection): string {
  const name = selection.name.trim();
  return name === '' ? String(selection.code) : `${String(selection.code)}_${name}`;
}

/**
 * Distinct native frequencies of the known selected series, when more than
 * one. Unknown codes do not count.
 */
export function detectMixedFrequencies(
  catalog: SeriesCatalog,
  codes: readonly number[]
): Frequency[] | null {
  const frequencies: Frequency[] = [];
  for (const code of codes) {
    const frequency = catalog.byCode.get(code)?.frequency;
    if (frequency !== undefined && !frequencies.includes(frequency)) {
      frequencies.push(frequency);
    }
  }
  return frequencies.length > 1 ? frequencies : null;
}

export const rangeDays = (range: DateRange): number =>
  Math.round((range.end.getTime() - range.start.getTime()) / DAY_MS);

export function seriesWarnings(
  catalog: SeriesCatalog,
  selections: readonly SeriesSelection[],
  range: DateRange
): SeriesWarning[] {
  const warnings: SeriesWarning[] = [];

  const frequencies = detectMixedFrequencies(
    catalog,
    selections.map((selection) => selection.code)
  );
  if (frequencies !== null) {
    warnings.push({ type: 'MIXED_FREQUENCIES', frequencies });
  }

  const days = rangeDays(range);
  if (days > LONG_RANGE_DAYS) {
    warnings.push({ type: 'LONG_RANGE', days });
  }

  return warnings;
}

const columnValues = (table: AlignedTable, column: string): { date: Date; value: number }[] => {
  const values: { date: Date; value: number }[] = [];
  for (const row of table.rows) {
    const value = row.values[column];
    if (value !== undefined && Number.isFinite(value)) {
      values.push({ date: row.date, value });
    }
  }
  return values;
};

/**
 * Descriptive statistics of every column of an aligned table.
 */
export function describeSeries(table: AlignedTable): SeriesDescription[] {
  return table.columns.map((column) => {
    const observed = columnValues(table, column);
    const values = observed.map((entry) => entry.value);
    return {
      column,
      count: values.length,
      missing: table.rows.length - values.length,
      firstDate: observed[0]?.date ?? null,
      lastDate: observed[observed.length - 1]?.date ?? null,
      mean: mean(values),
      median: median(values),
      std: sampleStd(values),
      min: values.length === 0 ? null : Math.min(...values),
      max: values.length === 0 ? null : Math.max(...values),
      q1: quantile(values, 0.25),
      q3: quantile(values, 0.75),
    };
  });
}

const pairedPoints = (table: AlignedTable, xColumn: string, yColumn: string): Point[] => {
  const points: Point[] = [];
  for (const row of table.rows) {
    const x = row.values[xColumn];
    const y = row.values[yColumn];
    if (x !== undefined && y !== undefined && Number.isFinite(x) && Number.isFinite(y)) {
      points.push({ x, y });
    }
  }
  return points;
};

/**
 * Pearson correlation of every pair of columns, each over the dates where
 * both have a value.
 */
export function correlationMatrix(table: AlignedTable): CorrelationMatrix {
  return {
    columns: table.columns,
    values: table.columns.map((x) =>
      table.columns.map((y) => pearsonCorrelation(pairedPoints(table, x, y)))
    ),
  };
}

/**
 * Least-squares line of `yColumn` against `xColumn`; null with too few
 * common points.
 */
export function trendBetween(
  table: AlignedTable,
  xColumn: string,
  yColumn: string
): Result<LinearTrend | null, UnknownColumnError> {
  for (const column of [xColumn, yColumn]) {
    if (!table.columns.includes(column)) {
      return err(createUnknownColumnError(column));
    }
  }
  return ok(linearTrend(pairedPoints(table, xColumn, yColumn)));
}
