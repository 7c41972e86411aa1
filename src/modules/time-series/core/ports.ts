/**
 * Time Series Module - Ports
 */

import type { FetchError } from '@/common/types/errors.js';
import type { Series } from '@/common/types/series.js';
import type { DateRange } from '@/infra/bcb/index.js';
import type { Result } from 'neverthrow';

/**
 * Source of SGS series; the SGS client implements it.
 */
export interface SeriesSource {
  fetchSeries(code: number, range: DateRange): Promise<Result<Series, FetchError>>;
}
