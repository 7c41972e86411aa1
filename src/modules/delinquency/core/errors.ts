/**
 * Delinquency Module - Domain Errors
 */

export interface UnknownStateError {
  readonly type: 'UNKNOWN_STATE';
  readonly state: string;
  readonly message: string;
}

export type DelinquencyError = UnknownStateError;

export const createUnknownStateError = (state: string): UnknownStateError => ({
  type: 'UNKNOWN_STATE',
  state,
  message: `State '${state}' is not in any region`,
});
