/**
 * Expectations Module - Domain Errors
 */

import type { MalformedInputError } from '@/common/types/errors.js';

export interface UnknownIndicatorError {
  readonly type: 'UNKNOWN_INDICATOR';
  readonly indicator: string;
  readonly message: string;
}

export type ExpectationsError = MalformedInputError | UnknownIndicatorError;

export const createUnknownIndicatorError = (indicator: string): UnknownIndicatorError => ({
  type: 'UNKNOWN_INDICATOR',
  indicator,
  message: `Indicator '${indicator}' is not in the catalog`,
});
