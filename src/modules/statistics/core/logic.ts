/**
 * Statistics Module - Pure Functions
 *
 * Every function takes already-cleaned finite numbers and returns null when
 * the sample is too small for the statistic.
 */

import type { LinearTrend, Point } from './types.js';

const sum = (values: readonly number[]): number =>
  values.reduce((total, value) => total + value, 0);

export function mean(values: readonly number[]): number | null {
  return values.length === 0 ? null : sum(values) / values.length;
}

/**
 * Linear-interpolated quantile, `q` in [0, 1].
 */
export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * Math.min(1, Math.max(0, q));
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const low = sorted[lower];
  const high = sorted[upper];
  if (low === undefined || high === undefined) return null;

  return low + (high - low) * (position - lower);
}

export const median = (values: readonly number[]): number | null => quantile(values, 0.5);

/**
 * Standard deviation with n − 1 degrees of freedom.
 */
export function sampleStd(values: readonly number[]): number | null {
  const average = mean(values);
  if (average === null || values.length < 2) return null;

  const squares = sum(values.map((value) => (value - average) ** 2));
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Pearson correlation coefficient. Null with fewer than two points or when
 * either coordinate is constant.
 */
export function pearsonCorrelation(points: readonly Point[]): number | null {
  if (points.length < 2) return null;

  const meanX = sum(points.map((point) => point.x)) / points.length;
  const meanY = sum(points.map((point) => point.y)) / points.length;

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (const point of points) {
    const dx = point.x - meanX;
    const dy = point.y - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) return null;
  return Math.max(-1, Math.min(1, covariance / Math.sqrt(varianceX * varianceY)));
}

/** Fewest points a trend line is fitted on */
export const MIN_TREND_POINTS = 3;

/**
 * Ordinary least-squares line. Null below MIN_TREND_POINTS points or when
 * every x is the same.
 */
export function linearTrend(points: readonly Point[]): LinearTrend | null {
  if (points.length < MIN_TREND_POINTS) return null;

  const meanX = sum(points.map((point) => point.x)) / points.length;
  const meanY = sum(points.map((point) => point.y)) / points.length;

  let numerator = 0;
  let denominator = 0;
  for (const point of points) {
    numerator += (point.x - meanX) * (point.y - meanY);
    denominator += (point.x - meanX) ** 2;
  }
  if (denominator === 0) return null;

  const slope = numerator / denominator;
  return { slope, intercept: meanY - slope * meanX, count: points.length };
}
