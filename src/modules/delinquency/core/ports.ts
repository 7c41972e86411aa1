/**
 * Delinquency Module - Ports
 */

import type { DelinquencyMode, Location } from './types.js';
import type { FetchError } from '@/common/types/errors.js';
import type { Series } from '@/common/types/series.js';
import type { DateRange } from '@/infra/bcb/index.js';
import type { Result } from 'neverthrow';

/**
 * Monthly non-performing loan rates (%) of a region or state.
 */
export interface DelinquencyRepository {
  /** The last `count` observations, ascending */
  getLast(
    location: Location,
    mode: DelinquencyMode,
    count: number
  ): Promise<Result<Series, FetchError>>;

  getSeries(
    location: Location,
    mode: DelinquencyMode,
    range: DateRange
  ): Promise<Result<Series, FetchError>>;
}
