/**
 * Chart Axis Module - Types
 */

/**
 * Any table whose rows carry a `values` record: wide tables and aligned
 * series tables both qualify.
 */
export interface ValueRows {
  readonly rows: readonly { readonly values: Readonly<Record<string, number>> }[];
}

export interface VariableMagnitude {
  readonly variable: string;
  /** Mean of absolute values; null when the variable has no value */
  readonly meanAbs: number | null;
}

/**
 * Partition of the charted variables over one or two value axes.
 * `secondary` is empty when no split is needed.
 */
export interface AxisGroups {
  readonly split: boolean;
  readonly primary: readonly string[];
  readonly secondary: readonly string[];
}
