/**
 * CSV encoding for spreadsheet users with a Brazilian locale:
 * `;` between fields, `,` as decimal separator, UTF-8 with BOM.
 */

import { stringify } from 'csv-stringify/sync';

import { formatIsoDate } from '@/common/types/temporal.js';

import { columnKeys, exportColumns } from '../../core/logic.js';

import type { ExportColumn, FlatRow } from '../../core/types.js';

export const CSV_DELIMITER = ';';

/**
 * `0.5` → `0,5`. Non-finite numbers are written as empty fields.
 */
export const formatCsvNumber = (value: number): string =>
  Number.isFinite(value) ? String(value).replace('.', ',') : '';

/**
 * Encodes rows with a header line. Columns default to every key of the
 * rows, in order of first appearance. Dates are written as YYYY-MM-DD and
 * missing values as empty fields.
 */
export function toCsv(rows: readonly FlatRow[], columns?: readonly ExportColumn[]): string {
  const selected = columns ?? exportColumns(columnKeys(rows));

  return stringify(
    rows.map((row) => ({ ...row })),
    {
      bom: true,
      delimiter: CSV_DELIMITER,
      header: true,
      columns: selected.map((column) => ({ key: column.key, header: column.header })),
      cast: {
        number: formatCsvNumber,
        date: formatIsoDate,
      },
    }
  );
}
