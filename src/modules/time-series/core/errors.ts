/**
 * Time Series Module - Domain Errors
 */

export interface NoSeriesSelectedError {
  readonly type: 'NO_SERIES_SELECTED';
  readonly message: string;
}

export interface InvalidDateRangeError {
  readonly type: 'INVALID_DATE_RANGE';
  readonly message: string;
}

export interface UnknownColumnError {
  readonly type: 'UNKNOWN_COLUMN';
  readonly column: string;
  readonly message: string;
}

export type TimeSeriesError = NoSeriesSelectedError | InvalidDateRangeError | UnknownColumnError;

export const createNoSeriesSelectedError = (): NoSeriesSelectedError => ({
  type: 'NO_SERIES_SELECTED',
  message: 'Select at least one series',
});

export const createInvalidDateRangeError = (message: string): InvalidDateRangeError => ({
  type: 'INVALID_DATE_RANGE',
  message,
});

export const createUnknownColumnError = (column: string): UnknownColumnError => ({
  type: 'UNKNOWN_COLUMN',
  column,
  message: `Column '${column}' is not in the table`,
});
