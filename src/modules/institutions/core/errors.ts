/**
 * Institutions Module - Domain Errors
 */

import type { MalformedInputError } from '@/common/types/errors.js';

/**
 * Error when a download period range is not a valid quarter range.
 */
export interface InvalidQuarterRangeError {
  readonly type: 'INVALID_QUARTER_RANGE';
  readonly message: string;
}

/**
 * Error when an institution is not part of the table.
 */
export interface InstitutionNotFoundError {
  readonly type: 'INSTITUTION_NOT_FOUND';
  readonly entityId: string;
  readonly message: string;
}

export type InstitutionsError =
  | MalformedInputError
  | InvalidQuarterRangeError
  | InstitutionNotFoundError;

export const createInvalidQuarterRangeError = (message: string): InvalidQuarterRangeError => ({
  type: 'INVALID_QUARTER_RANGE',
  message,
});

export const createInstitutionNotFoundError = (entityId: string): InstitutionNotFoundError => ({
  type: 'INSTITUTION_NOT_FOUND',
  entityId,
  message: `Institution '${entityId}' is not part of the table`,
});
