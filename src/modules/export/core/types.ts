/**
 * Export Module - Types
 */

import type { CellValue } from '@/common/types/tabular.js';

/**
 * One record of a flat export; keys are column keys.
 */
export type FlatRow = Readonly<Record<string, CellValue>>;

export interface ExportColumn {
  readonly key: string;
  /** Text of the header line */
  readonly header: string;
}

/**
 * Translation of a label key (e.g. `inad_region`) for a locale.
 * Only export headers go through it.
 */
export type LabelLookup = (key: string, locale: string) => string;
