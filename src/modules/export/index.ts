/**
 * Export Module Public API
 *
 * Flat rows from tables, rankings and aligned series, and their CSV encoding.
 */

export type { FlatRow, ExportColumn, LabelLookup } from './core/types.js';

export {
  flattenWideTable,
  flattenRankingRows,
  flattenAlignedTable,
  columnKeys,
  exportColumns,
  ENTITY_ID_KEY,
  ENTITY_NAME_KEY,
  DATE_KEY,
} from './core/logic.js';

export { toCsv, formatCsvNumber, CSV_DELIMITER } from './shell/csv/csv-encoder.js';
