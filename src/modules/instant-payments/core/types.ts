/**
 * Instant Payments Module - Types
 *
 * Daily statistics of settled Pix transactions.
 */

import type { DateRange } from '@/infra/bcb/index.js';

/** First settlement day of Pix */
export const PIX_LAUNCH_DATE = new Date(Date.UTC(2020, 10, 3));

/**
 * Source columns of the settled-transactions table.
 */
export const PIX_COLUMNS = {
  date: 'Data',
  quantity: 'Quantidade',
  total: 'Total',
  average: 'Media',
} as const;

export type PixMetric = 'quantity' | 'total' | 'average';

export const PIX_METRICS: readonly PixMetric[] = ['quantity', 'total', 'average'];

/**
 * One settlement day: transaction count, volume (R$) and average ticket (R$).
 */
export interface PixDay {
  readonly date: Date;
  readonly quantity: number | null;
  readonly total: number | null;
  readonly average: number | null;
}

export interface PixKpis {
  readonly days: number;
  readonly totalQuantity: number;
  readonly totalVolume: number;
  /** Mean of the daily average tickets */
  readonly averageTicket: number | null;
}

export interface MetricComparison {
  readonly metric: PixMetric;
  readonly averageA: number | null;
  readonly averageB: number | null;
  /** (B − A) / A; null when A is zero or either side is missing */
  readonly change: number | null;
}

export interface PeriodComparison {
  readonly periodA: DateRange;
  readonly periodB: DateRange;
  readonly metrics: readonly MetricComparison[];
}

export interface MetricSummary {
  readonly metric: PixMetric;
  readonly mean: number | null;
  readonly median: number | null;
  readonly std: number | null;
  readonly min: number | null;
  readonly max: number | null;
  readonly q1: number | null;
  readonly q3: number | null;
}

export interface PixOverview {
  readonly range: DateRange;
  readonly days: readonly PixDay[];
  readonly kpis: PixKpis;
  readonly statistics: readonly MetricSummary[];
  /** Null when either period has no settlement day */
  readonly comparison: PeriodComparison | null;
}
