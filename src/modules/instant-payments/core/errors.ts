/**
 * Instant Payments Module - Domain Errors
 */

import type { MalformedInputError } from '@/common/types/errors.js';

export interface InvalidPeriodError {
  readonly type: 'INVALID_PERIOD';
  readonly message: string;
}

export type InstantPaymentsError = MalformedInputError | InvalidPeriodError;

export const createInvalidPeriodError = (message: string): InvalidPeriodError => ({
  type: 'INVALID_PERIOD',
  message,
});
