/**
 * Snapshot Module - Types
 */

import type { CellValue } from '@/common/types/tabular.js';

export interface LatestSnapshotOptions {
  /** Fail with EmptyResultError instead of returning an empty table */
  requireNonEmpty?: boolean;
  /** Keep rows at this date instead of the most recent one */
  target?: Exclude<CellValue, null>;
}
