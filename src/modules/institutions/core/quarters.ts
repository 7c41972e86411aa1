/**
 * Quarter arithmetic on `YYYYMM` periods.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidQuarterRangeError, type InvalidQuarterRangeError } from './errors.js';

const QUARTER_END_MONTHS = new Set([3, 6, 9, 12]);

/** Longest range a history download may span, in months */
export const MAX_RANGE_MONTHS = 24;

export const toPeriod = (year: number, month: number): number => year * 100 + month;

export const splitPeriod = (period: number): { year: number; month: number } => ({
  year: Math.floor(period / 100),
  month: period % 100,
});

/**
 * Quarter ends to probe for the latest published data, newest first.
 * The first candidate is the end of the quarter containing `today`.
 */
export function latestQuarterCandidates(today: Date, count = 6): number[] {
  let year = today.getUTCFullYear();
  let month = today.getUTCMonth() + 1;
  const candidates: number[] = [];

  for (let i = 0; i < count; i++) {
    const quarterEnd = Math.floor((month - 1) / 3) * 3 + 3;
    candidates.push(toPeriod(year, quarterEnd));
    month -= 3;
    if (month <= 0) {
      month += 12;
      year -= 1;
    }
  }

  return candidates;
}

/**
 * Every quarter end from `start` to `end`, both included.
 */
export function quarterRange(
  start: number,
  end: number
): Result<number[], InvalidQuarterRangeError> {
  const from = splitPeriod(start);
  const to = splitPeriod(end);

  if (!QUARTER_END_MONTHS.has(from.month) || !QUARTER_END_MONTHS.has(to.month)) {
    return err(
      createInvalidQuarterRangeError('Periods must end a quarter (months 03, 06, 09 or 12)')
    );
  }

  const months = (to.year - from.year) * 12 + (to.month - from.month);
  if (months < 0) {
    return err(createInvalidQuarterRangeError('End period must not precede the start period'));
  }
  if (months > MAX_RANGE_MONTHS) {
    return err(
      createInvalidQuarterRangeError(
        `Range spans ${String(months)} months; the limit is ${String(MAX_RANGE_MONTHS)}`
      )
    );
  }

  const periods: number[] = [];
  let { year, month } = from;
  while (toPeriod(year, month) <= end) {
    periods.push(toPeriod(year, month));
    month += 3;
    if (month > 12) {
      month = 3;
      year += 1;
    }
  }
  return ok(periods);
}
