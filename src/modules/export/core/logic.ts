/**
 * Export Module - Flatteners
 *
 * Turn the analytical shapes into flat rows with one key per column.
 * Missing values become null.
 */

import { wideValue, type WideTable } from '@/common/types/wide-table.js';

import type { ExportColumn, FlatRow, LabelLookup } from './types.js';
import type { CellValue } from '@/common/types/tabular.js';
import type { RankingRow } from '@/modules/ranking/index.js';
import type { AlignedTable } from '@/modules/series/index.js';

export const ENTITY_ID_KEY = 'entityId';
export const ENTITY_NAME_KEY = 'entityName';
export const DATE_KEY = 'Date';

export function flattenWideTable(table: WideTable): FlatRow[] {
  return table.rows.map((row) => {
    const flat: Record<string, CellValue> = {
      [ENTITY_ID_KEY]: row.entityId,
      [ENTITY_NAME_KEY]: row.entityName,
    };
    for (const variable of table.variables) {
      flat[variable] = wideValue(row, variable);
    }
    return flat;
  });
}

export const flattenRankingRows = (rows: readonly RankingRow[]): FlatRow[] =>
  rows.map((row) => ({
    rank: row.rank,
    [ENTITY_ID_KEY]: row.entityId,
    [ENTITY_NAME_KEY]: row.entityName,
    value: row.value,
    total: row.total,
  }));

export function flattenAlignedTable(table: AlignedTable): FlatRow[] {
  return table.rows.map((row) => {
    const flat: Record<string, CellValue> = { [DATE_KEY]: row.date };
    for (const column of table.columns) {
      flat[column] = row.values[column] ?? null;
    }
    return flat;
  });
}

/**
 * Union of the rows' keys in order of first appearance.
 */
export function columnKeys(rows: readonly FlatRow[]): string[] {
  const keys: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        keys.push(key);
      }
    }
  }
  return keys;
}

/**
 * Columns for `keys`, headed by their translated label when a lookup is
 * given, by the key itself otherwise.
 */
export const exportColumns = (
  keys: readonly string[],
  lookup?: LabelLookup,
  locale = 'pt'
): ExportColumn[] =>
  keys.map((key) => ({ key, header: lookup === undefined ? key : lookup(key, locale) }));
