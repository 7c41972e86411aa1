/**
 * Interest Rates Module - Domain Errors
 */

import type { MalformedInputError } from '@/common/types/errors.js';

export interface UnknownModalityError {
  readonly type: 'UNKNOWN_MODALITY';
  readonly modality: string;
  readonly message: string;
}

export type InterestRatesError = MalformedInputError | UnknownModalityError;

export const createUnknownModalityError = (modality: string): UnknownModalityError => ({
  type: 'UNKNOWN_MODALITY',
  modality,
  message: `Modality '${modality}' is not in the catalog`,
});
