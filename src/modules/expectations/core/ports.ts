/**
 * Expectations Module - Ports
 */

import type { FetchError } from '@/common/types/errors.js';
import type { TabularResult } from '@/common/types/tabular.js';
import type { Result } from 'neverthrow';

export interface ExpectationsRepository {
  /**
   * Latest annual-expectation rows of an indicator, newest survey first.
   */
  getAnnualExpectations(
    indicator: string,
    limit: number
  ): Promise<Result<TabularResult, FetchError>>;
}
