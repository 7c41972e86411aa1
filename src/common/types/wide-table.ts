/**
 * Wide analytical table: one row per entity, one column per variable.
 */

export interface WideRow {
  readonly entityId: string;
  readonly entityName: string;
  /** A variable absent from this record is missing for the entity */
  readonly values: Readonly<Record<string, number>>;
}

export interface WideTable {
  /** Variables present in the table, in catalog order */
  readonly variables: readonly string[];
  readonly rows: readonly WideRow[];
}

export const emptyWideTable = (): WideTable => ({ variables: [], rows: [] });

/**
 * Value of a variable for a row, or null when missing.
 */
export const wideValue = (row: WideRow, variable: string): number | null => {
  const value = row.values[variable];
  return value === undefined || !Number.isFinite(value) ? null : value;
};
