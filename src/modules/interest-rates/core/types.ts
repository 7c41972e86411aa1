/**
 * Interest Rates Module - Types
 *
 * Annual rates charged by each institution, per credit modality.
 */

import { Type, type Static } from '@sinclair/typebox';

import type { Series } from '@/common/types/series.js';
import type { TabularResult } from '@/common/types/tabular.js';
import type { RankingRow, RankPosition } from '@/modules/ranking/index.js';

// ============================================================================
// Catalog file schema
// ============================================================================

export const ModalityFrequencySchema = Type.Union([Type.Literal('daily'), Type.Literal('monthly')]);

export type ModalityFrequency = Static<typeof ModalityFrequencySchema>;

const EndpointSchema = Type.Object({
  endpoint: Type.String({ minLength: 1 }),
  dateColumn: Type.String({ minLength: 1 }),
});

export const ModalityDefinitionSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  frequency: ModalityFrequencySchema,
  ranked: Type.Boolean(),
});

export type ModalityDefinition = Static<typeof ModalityDefinitionSchema>;

export const InterestRateCatalogFileSchema = Type.Object({
  service: Type.String({ minLength: 1 }),
  endpoints: Type.Object({
    daily: EndpointSchema,
    monthly: EndpointSchema,
  }),
  columns: Type.Object({
    modality: Type.String({ minLength: 1 }),
    institution: Type.String({ minLength: 1 }),
    rate: Type.String({ minLength: 1 }),
  }),
  limits: Type.Object({
    latest: Type.Integer({ minimum: 1 }),
    history: Type.Integer({ minimum: 1 }),
    download: Type.Integer({ minimum: 1 }),
  }),
  shortLabels: Type.Array(Type.Object({ from: Type.String({ minLength: 1 }), to: Type.String() })),
  modalities: Type.Array(ModalityDefinitionSchema, { minItems: 1 }),
});

export type InterestRateCatalogFile = Static<typeof InterestRateCatalogFileSchema>;

export type InterestRateCatalog = InterestRateCatalogFile;

export type RateColumns = InterestRateCatalog['columns'];

// ============================================================================
// Domain types
// ============================================================================

/**
 * Rows of one modality at its most recent reference date.
 */
export interface ModalitySnapshot {
  readonly modality: string;
  readonly shortLabel: string;
  /** null when the modality returned no rows */
  readonly referenceDate: Date | null;
  readonly rows: TabularResult;
}

export interface ModalityRanking {
  readonly modality: string;
  readonly shortLabel: string;
  readonly referenceDate: Date | null;
  /** Institutions with a positive rate */
  readonly total: number;
  /** Highest rates first */
  readonly largest: readonly RankingRow[];
  /** Lowest rates first */
  readonly smallest: readonly RankingRow[];
}

export interface BankRateEntry {
  readonly modality: string;
  readonly shortLabel: string;
  readonly rate: number | null;
  readonly formattedRate: string;
  /** Lower rates rank first, out of every institution in the modality */
  readonly position: RankPosition | null;
}

export interface BankRateProfile {
  readonly institution: string;
  readonly entries: readonly BankRateEntry[];
}

export interface MedianRateChart {
  readonly modality: string;
  readonly shortLabel: string;
  /** Rows the median was computed from */
  readonly observations: number;
  readonly series: Series;
}
