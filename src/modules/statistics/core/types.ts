/**
 * Statistics Module - Types
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Least-squares line `y = slope · x + intercept`.
 */
export interface LinearTrend {
  readonly slope: number;
  readonly intercept: number;
  /** Points the fit used */
  readonly count: number;
}
