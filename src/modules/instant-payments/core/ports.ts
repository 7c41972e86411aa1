/**
 * Instant Payments Module - Ports
 */

import type { FetchError } from '@/common/types/errors.js';
import type { TabularResult } from '@/common/types/tabular.js';
import type { Result } from 'neverthrow';

export interface PixRepository {
  /**
   * Settled-transaction rows from `start` (inclusive) onwards, oldest first.
   */
  getSettledSince(start: Date): Promise<Result<TabularResult, FetchError>>;
}
