/**
 * Institutions Module - Pure Functions
 *
 * Registry filtering and the long → wide merge of IF.Data report values.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { requireColumns, toNumber, toText, type TabularResult } from '@/common/types/tabular.js';
import { wideValue, type WideRow, type WideTable } from '@/common/types/wide-table.js';

import type {
  MaterialityThreshold,
  RegistryEntry,
  RegistryFilter,
  SourceField,
  ValueTableInput,
  WideTableOptions,
} from './types.js';
import type { MalformedInputError } from '@/common/types/errors.js';

/**
 * Registry rows in the requested segments whose name contains the pattern.
 * Each institution appears once; the first row wins.
 */
export function filterRegistry(
  table: TabularResult,
  filter: RegistryFilter
): Result<RegistryEntry[], MalformedInputError> {
  const { columns } = filter;

  return requireColumns(
    table,
    [columns.entityId, columns.name, columns.segment],
    'institution registry'
  ).andThen(() => {
    const segments = new Set(filter.segments);
    const pattern = filter.namePattern.toLowerCase();
    const seen = new Set<string>();
    const entries: RegistryEntry[] = [];

    for (const row of table) {
      const entityId = toText(row[columns.entityId]);
      const name = toText(row[columns.name]);
      const segment = toText(row[columns.segment]);

      if (entityId === null || name === null || segment === null) continue;
      if (!segments.has(segment)) continue;
      if (!name.toLowerCase().includes(pattern)) continue;
      if (seen.has(entityId)) continue;

      seen.add(entityId);
      entries.push({ entityId, name, segment });
    }

    return ok(entries);
  });
}

/**
 * Removes the display suffix and surrounding blanks from a registry name.
 */
export const cleanDisplayName = (name: string, suffix: RegExp | undefined): string =>
  (suffix === undefined ? name : name.replace(suffix, '')).trim();

const fieldKey = (field: SourceField): string => `${field.report}\u0000${field.column}`;

interface LongRecord {
  entityId: string;
  variableId: string;
  value: number;
}

/**
 * |numerator| / denominator × 100, rounded half-up to two decimals.
 * Null when a component is missing or the denominator is zero.
 */
export function absoluteRatioPercent(
  numerator: number | undefined,
  denominator: number | undefined
): number | null {
  if (numerator === undefined || denominator === undefined || denominator === 0) {
    return null;
  }
  return new Decimal(numerator)
    .abs()
    .div(denominator)
    .times(100)
    .toDecimalPlaces(2, Decimal.ROUND_HALF_UP)
    .toNumber();
}

/**
 * Merges long-format report tables into one wide table.
 *
 * Steps, in order:
 * 1. keep rows of registered institutions
 * 2. keep rows of catalog variables or derivation components
 * 3. scale fraction-encoded variables to percent
 * 4. derive ratio variables from their components
 * 5. pivot, first value per (institution, variable) wins
 * 6. attach cleaned registry names
 */
export function buildWideTable(
  registry: readonly RegistryEntry[],
  valueTables: readonly ValueTableInput[],
  options: WideTableOptions
): Result<WideTable, MalformedInputError> {
  const { columns } = options;

  for (const input of valueTables) {
    const check = requireColumns(
      input.table,
      [columns.entityId, columns.variable, columns.value],
      `value table '${input.report}'`
    );
    if (check.isErr()) {
      return err(check.error);
    }
  }

  const names = new Map<string, string>();
  for (const entry of registry) {
    if (!names.has(entry.entityId)) {
      names.set(entry.entityId, entry.name);
    }
  }

  const directByField = new Map<string, { variableId: string; fractionEncoded: boolean }[]>();
  const componentFields = new Set<string>();
  for (const variable of options.variables) {
    if (variable.source !== undefined) {
      const key = fieldKey(variable.source);
      const targets = directByField.get(key) ?? [];
      targets.push({
        variableId: variable.id,
        fractionEncoded: variable.source.fractionEncoded === true,
      });
      directByField.set(key, targets);
    }
    if (variable.derivation !== undefined) {
      componentFields.add(fieldKey(variable.derivation.numerator));
      componentFields.add(fieldKey(variable.derivation.denominator));
    }
  }

  const records: LongRecord[] = [];
  const components = new Map<string, Map<string, number>>();

  for (const input of valueTables) {
    for (const row of input.table) {
      const entityId = toText(row[columns.entityId]);
      if (entityId === null || !names.has(entityId)) continue;

      const column = toText(row[columns.variable])?.trim();
      if (column === undefined) continue;

      const key = fieldKey({ report: input.report, column });
      const targets = directByField.get(key);
      const isComponent = componentFields.has(key);
      if (targets === undefined && !isComponent) continue;

      const value = toNumber(row[columns.value]);
      if (value === null) continue;

      for (const target of targets ?? []) {
        records.push({
          entityId,
          variableId: target.variableId,
          value: target.fractionEncoded ? value * 100 : value,
        });
      }

      if (isComponent) {
        const own = components.get(entityId) ?? new Map<string, number>();
        if (!own.has(key)) {
          own.set(key, value);
        }
        components.set(entityId, own);
      }
    }
  }

  for (const [entityId, own] of components) {
    for (const variable of options.variables) {
      if (variable.derivation === undefined) continue;

      const derived = absoluteRatioPercent(
        own.get(fieldKey(variable.derivation.numerator)),
        own.get(fieldKey(variable.derivation.denominator))
      );
      if (derived !== null) {
        records.push({ entityId, variableId: variable.id, value: derived });
      }
    }
  }

  const pivot = new Map<string, Record<string, number>>();
  const present = new Set<string>();
  for (const record of records) {
    const values = pivot.get(record.entityId) ?? {};
    if (!(record.variableId in values)) {
      values[record.variableId] = record.value;
      present.add(record.variableId);
    }
    pivot.set(record.entityId, values);
  }

  const rows: WideRow[] = Array.from(pivot, ([entityId, values]) => ({
    entityId,
    entityName: cleanDisplayName(names.get(entityId) ?? entityId, options.displaySuffix),
    values,
  }));

  return ok({
    variables: options.variables.map((variable) => variable.id).filter((id) => present.has(id)),
    rows,
  });
}

/**
 * Drops institutions at or below any threshold. A missing value counts as
 * zero; thresholds on variables absent from the table are ignored.
 */
export function applyMaterialityFilter(
  table: WideTable,
  thresholds: readonly MaterialityThreshold[]
): WideTable {
  const applicable = thresholds.filter((threshold) => table.variables.includes(threshold.variable));
  if (applicable.length === 0) {
    return table;
  }

  return {
    variables: table.variables,
    rows: table.rows.filter((row) =>
      applicable.every(
        (threshold) => (wideValue(row, threshold.variable) ?? 0) > threshold.minimum
      )
    ),
  };
}
