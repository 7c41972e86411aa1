/**
 * Time Series Module - Types
 */

import { Type, type Static } from '@sinclair/typebox';

import { Frequency, type ResampleFrequency } from '@/common/types/temporal.js';

import type { DateRange } from '@/infra/bcb/index.js';
import type { AxisGroups } from '@/modules/chart-axis/index.js';
import type { AlignedTable } from '@/modules/series/index.js';

export const SeriesDefinitionSchema = Type.Object({
  code: Type.Integer({ minimum: 1 }),
  name: Type.String({ minLength: 1 }),
  description: Type.String({ minLength: 1 }),
  frequency: Type.Enum(Frequency),
});

export const SeriesCatalogFileSchema = Type.Object({
  categories: Type.Array(
    Type.Object({
      key: Type.String({ minLength: 1 }),
      labelKey: Type.String({ minLength: 1 }),
      series: Type.Array(SeriesDefinitionSchema, { minItems: 1 }),
    }),
    { minItems: 1 }
  ),
});

export type SeriesCatalogFile = Static<typeof SeriesCatalogFileSchema>;

export type SeriesDefinition = Static<typeof SeriesDefinitionSchema>;

export type SeriesCategory = SeriesCatalogFile['categories'][number];

export interface SeriesCatalog {
  readonly categories: readonly SeriesCategory[];
  readonly byCode: ReadonlyMap<number, SeriesDefinition>;
}

/**
 * A series chosen by the user. An empty name labels the column by code only.
 */
export interface SeriesSelection {
  readonly code: number;
  readonly name: string;
}

export type SeriesWarning =
  | { readonly type: 'MIXED_FREQUENCIES'; readonly frequencies: readonly Frequency[] }
  | { readonly type: 'LONG_RANGE'; readonly days: number };

export interface CombinedSeriesInput {
  readonly selections: readonly SeriesSelection[];
  readonly range: DateRange;
  readonly resample: ResampleFrequency;
}

export interface CombinedSeries {
  /** One column per selection, forward-filled on the union of dates */
  readonly table: AlignedTable;
  /** Columns drawn on the combined chart */
  readonly chartColumns: readonly string[];
  readonly axes: AxisGroups;
  readonly warnings: readonly SeriesWarning[];
}

export interface SeriesDescription {
  readonly column: string;
  /** Dates with a value */
  readonly count: number;
  /** Dates without one */
  readonly missing: number;
  readonly firstDate: Date | null;
  readonly lastDate: Date | null;
  readonly mean: number | null;
  readonly median: number | null;
  readonly std: number | null;
  readonly min: number | null;
  readonly max: number | null;
  readonly q1: number | null;
  readonly q3: number | null;
}

export interface CorrelationMatrix {
  readonly columns: readonly string[];
  /** `values[i][j]`: Pearson r of columns i and j over their common dates */
  readonly values: readonly (readonly (number | null)[])[];
}
