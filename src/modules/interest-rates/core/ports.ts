/**
 * Interest Rates Module - Ports
 */

import type { ModalityDefinition } from './types.js';
import type { FetchError } from '@/common/types/errors.js';
import type { TabularResult } from '@/common/types/tabular.js';
import type { Result } from 'neverthrow';

export interface InterestRateRepository {
  /**
   * Most recent rows of a modality, newest first.
   */
  getModalityRates(
    modality: ModalityDefinition,
    limit: number
  ): Promise<Result<TabularResult, FetchError>>;
}
