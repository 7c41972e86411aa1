/**
 * Date-indexed numeric series.
 */

export interface SeriesPoint {
  readonly date: Date;
  /** null marks a missing observation */
  readonly value: number | null;
}

/**
 * Unique dates, ascending.
 */
export type Series = readonly SeriesPoint[];
