/**
 * Frequency of temporal data points as published by the source APIs
 */
export enum Frequency {
  DAY = 'DAY',
  MONTH = 'MONTH',
  QUARTER = 'QUARTER',
  YEAR = 'YEAR',
}

/**
 * Target of a post-query resample. `none` passes the series through.
 */
export type ResampleFrequency = 'none' | 'monthly' | 'annual';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Midnight UTC of the given instant's calendar day.
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Last calendar day of the instant's month, at midnight UTC.
 */
export function endOfUtcMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0));
}

/**
 * December 31st of the instant's year, at midnight UTC.
 */
export function endOfUtcYear(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), 11, 31));
}

export function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Formats a date as YYYY-MM-DD (UTC).
 */
export function formatIsoDate(date: Date): string {
  return date.toISOString().substring(0, 10);
}

/**
 * Builds a UTC date from year, 1-based month and day.
 */
export function utcDate(year: number, month: number, day = 1): Date {
  return new Date(Date.UTC(year, month - 1, day));
}
