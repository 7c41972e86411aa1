/**
 * Series Module - Types
 */

/**
 * One date of an aligned table. A column is absent from `values`
 * until its series has produced a first observation.
 */
export interface AlignedRow {
  readonly date: Date;
  readonly values: Readonly<Record<string, number>>;
}

/**
 * Several series joined on a common date index.
 */
export interface AlignedTable {
  /** Series names, in the caller's order */
  readonly columns: readonly string[];
  readonly rows: readonly AlignedRow[];
}
