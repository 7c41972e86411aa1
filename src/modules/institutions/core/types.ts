/**
 * Institutions Module - Types
 *
 * Supervised-institution financials (IF.Data): registry, report values,
 * and the variable catalog that turns them into a wide table.
 */

import { Type, type Static } from '@sinclair/typebox';

import type { TabularResult } from '@/common/types/tabular.js';
import type { WideTable } from '@/common/types/wide-table.js';
import type { DisplayUnit } from '@/modules/formatting/index.js';
import type { RankingBuckets, RankPosition } from '@/modules/ranking/index.js';

// ============================================================================
// Catalog file schema
// ============================================================================

export const IfDataReportSchema = Type.Union([Type.Literal('summary'), Type.Literal('assets')]);

/**
 * IF.Data reports: `summary` is Relatorio=1, `assets` is Relatorio=2.
 */
export type IfDataReport = Static<typeof IfDataReportSchema>;

const SourceFieldSchema = Type.Object({
  report: IfDataReportSchema,
  /** Value of the variable-name column in the report */
  column: Type.String({ minLength: 1 }),
});

export type SourceField = Static<typeof SourceFieldSchema>;

export const VariableDefinitionSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  label: Type.String({ minLength: 1 }),
  displayUnit: Type.Union([
    Type.Literal('currency'),
    Type.Literal('percent'),
    Type.Literal('index'),
  ]),
  sortDirection: Type.Union([Type.Literal('ascending'), Type.Literal('descending')]),
  labelKeys: Type.Object({
    largest: Type.String({ minLength: 1 }),
    smallest: Type.String({ minLength: 1 }),
  }),
  source: Type.Optional(
    Type.Object({
      report: IfDataReportSchema,
      column: Type.String({ minLength: 1 }),
      /** The report encodes a ratio as a fraction; shown as percent */
      fractionEncoded: Type.Optional(Type.Boolean()),
    })
  ),
  derivation: Type.Optional(
    Type.Object({
      /** |numerator| / denominator × 100, two decimals */
      kind: Type.Literal('absolute-ratio-percent'),
      numerator: SourceFieldSchema,
      denominator: SourceFieldSchema,
    })
  ),
});

export type VariableDefinition = Static<typeof VariableDefinitionSchema>;

export const IfDataCatalogFileSchema = Type.Object({
  registry: Type.Object({
    columns: Type.Object({
      entityId: Type.String({ minLength: 1 }),
      name: Type.String({ minLength: 1 }),
      segment: Type.String({ minLength: 1 }),
    }),
    segments: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    namePattern: Type.String({ minLength: 1 }),
    /** Regular expression removed from display names */
    displaySuffixPattern: Type.String({ minLength: 1 }),
  }),
  valueColumns: Type.Object({
    entityId: Type.String({ minLength: 1 }),
    variable: Type.String({ minLength: 1 }),
    value: Type.String({ minLength: 1 }),
  }),
  variables: Type.Array(VariableDefinitionSchema, { minItems: 1 }),
  materiality: Type.Array(
    Type.Object({
      variable: Type.String({ minLength: 1 }),
      minimum: Type.Number(),
    })
  ),
});

export type IfDataCatalogFile = Static<typeof IfDataCatalogFileSchema>;

// ============================================================================
// Domain types
// ============================================================================

export interface RegistryEntry {
  readonly entityId: string;
  readonly name: string;
  readonly segment: string;
}

export interface RegistryColumns {
  readonly entityId: string;
  readonly name: string;
  readonly segment: string;
}

export interface RegistryFilter {
  readonly columns: RegistryColumns;
  readonly segments: readonly string[];
  /** Case-insensitive substring the name must contain */
  readonly namePattern: string;
}

/**
 * Columns of a long-format value table.
 */
export interface ValueColumns {
  readonly entityId: string;
  readonly variable: string;
  readonly value: string;
}

export interface MaterialityThreshold {
  readonly variable: string;
  /** Entities must be strictly above this value */
  readonly minimum: number;
}

/**
 * Validated catalog, ready for the use cases.
 */
export interface IfDataCatalog {
  readonly registry: RegistryFilter;
  readonly displaySuffix: RegExp;
  readonly valueColumns: ValueColumns;
  readonly variables: readonly VariableDefinition[];
  readonly materiality: readonly MaterialityThreshold[];
}

export interface WideTableOptions {
  readonly variables: readonly VariableDefinition[];
  readonly columns: ValueColumns;
  readonly displaySuffix?: RegExp;
}

export interface ValueTableInput {
  readonly report: IfDataReport;
  readonly table: TabularResult;
}

/**
 * Latest quarter with data, as a wide table.
 * `period` is `YYYYMM`, or null when no candidate quarter had data.
 */
export interface InstitutionSnapshot {
  readonly period: number | null;
  readonly registrySize: number;
  readonly table: WideTable;
}

export interface VariableRanking {
  readonly variableId: string;
  readonly label: string;
  readonly displayUnit: DisplayUnit;
  /** null when no institution has the variable */
  readonly buckets: RankingBuckets | null;
}

export interface ProfileEntry {
  readonly variableId: string;
  readonly label: string;
  readonly displayUnit: DisplayUnit;
  readonly value: number | null;
  readonly formattedValue: string;
  readonly position: RankPosition | null;
}

export interface InstitutionProfile {
  readonly entityId: string;
  readonly entityName: string;
  readonly entries: readonly ProfileEntry[];
}

/**
 * IF.Data report number and the name it is published under.
 */
export const IFDATA_REPORTS: Readonly<Record<IfDataReport, { code: number; name: string }>> = {
  summary: { code: 1, name: 'Resumo' },
  assets: { code: 2, name: 'Ativo' },
};
