/**
 * Statistics Module Public API
 */

export type { Point, LinearTrend } from './core/types.js';

export {
  mean,
  median,
  quantile,
  sampleStd,
  pearsonCorrelation,
  linearTrend,
  MIN_TREND_POINTS,
} from './core/logic.js';
