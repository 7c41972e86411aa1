/**
 * Tabular data as returned by the open-data fetch collaborators.
 *
 * Rows are plain records keyed by column name. Columns are homogeneous across
 * rows, so the first row is representative of the table's shape.
 */

import { err, ok, type Result } from 'neverthrow';

import { createMalformedInputError, type MalformedInputError } from './errors.js';

export type CellValue = number | string | Date | null;

export type Row = Readonly<Record<string, CellValue>>;

/**
 * Ordered, read-only sequence of rows. Never mutated once handed to the core.
 */
export type TabularResult = readonly Row[];

/**
 * Checks whether a (non-empty) table carries a column.
 * An empty table has no shape, so every column is considered present.
 */
export const hasColumn = (table: TabularResult, column: string): boolean => {
  const first = table[0];
  return first === undefined || column in first;
};

/**
 * Ensures every listed column is present in the table.
 *
 * @param context - Human-readable name of the table/operation, used in the error
 */
export const requireColumns = (
  table: TabularResult,
  columns: readonly string[],
  context: string
): Result<void, MalformedInputError> => {
  for (const column of columns) {
    if (!hasColumn(table, column)) {
      return err(createMalformedInputError(column, context));
    }
  }
  return ok(undefined);
};

/**
 * Coerces a cell to a finite number. Numeric strings are parsed;
 * anything else (including blanks) is missing.
 */
export const toNumber = (cell: CellValue | undefined): number | null => {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell === 'string') {
    const trimmed = cell.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/**
 * Coerces a cell to a valid Date. ISO strings are parsed.
 */
export const toDate = (cell: CellValue | undefined): Date | null => {
  if (cell instanceof Date) {
    return Number.isNaN(cell.getTime()) ? null : cell;
  }
  if (typeof cell === 'string' && cell.trim() !== '') {
    const parsed = new Date(cell.trim());
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
};

/**
 * Coerces a cell to a trimmed string, or null when missing.
 */
export const toText = (cell: CellValue | undefined): string | null => {
  if (cell === null || cell === undefined) return null;
  if (cell instanceof Date) return cell.toISOString();
  return String(cell);
};
