/**
 * Expectations Module - Types
 */

import { Type, type Static } from '@sinclair/typebox';

export const ExpectationsCatalogFileSchema = Type.Object({
  service: Type.String({ minLength: 1 }),
  endpoint: Type.String({ minLength: 1 }),
  columns: Type.Object({
    indicator: Type.String({ minLength: 1 }),
    surveyDate: Type.String({ minLength: 1 }),
    referenceYear: Type.String({ minLength: 1 }),
    mean: Type.String({ minLength: 1 }),
    median: Type.String({ minLength: 1 }),
    stdDev: Type.String({ minLength: 1 }),
    min: Type.String({ minLength: 1 }),
    max: Type.String({ minLength: 1 }),
    respondents: Type.String({ minLength: 1 }),
  }),
  limit: Type.Integer({ minimum: 1 }),
  referenceYearCount: Type.Integer({ minimum: 1 }),
  indicators: Type.Array(
    Type.Object({
      name: Type.String({ minLength: 1 }),
      unit: Type.String({ minLength: 1 }),
    }),
    { minItems: 1 }
  ),
});

export type ExpectationsCatalogFile = Static<typeof ExpectationsCatalogFileSchema>;

export type ExpectationsCatalog = ExpectationsCatalogFile;

export type ExpectationColumns = ExpectationsCatalog['columns'];

export type IndicatorDefinition = ExpectationsCatalog['indicators'][number];

/**
 * Survey statistics for one reference year.
 */
export interface ExpectationRow {
  readonly referenceYear: number;
  readonly mean: number | null;
  readonly median: number | null;
  readonly stdDev: number | null;
  readonly min: number | null;
  readonly max: number | null;
  readonly respondents: number | null;
  readonly surveyDate: Date | null;
}

export interface IndicatorExpectations {
  readonly indicator: string;
  readonly unit: string;
  /** Date of the survey the rows come from */
  readonly surveyDate: Date | null;
  /** Ascending reference years, one row each */
  readonly rows: readonly ExpectationRow[];
}
