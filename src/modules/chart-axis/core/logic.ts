/**
 * Chart Axis Module - Pure Functions
 *
 * Decides whether variables plotted together need a second axis, based on
 * the order of magnitude of their mean absolute values.
 */

import type { AxisGroups, ValueRows, VariableMagnitude } from './types.js';

/** Largest/smallest mean ratio that still fits one axis */
export const MAX_SHARED_RATIO = 5;

/** Smallest log10 gap worth a split (≈ 5×) */
export const MIN_LOG_GAP = 0.7;

export function meanAbsoluteValues(
  table: ValueRows,
  variables: readonly string[]
): VariableMagnitude[] {
  return variables.map((variable) => {
    let sum = 0;
    let count = 0;
    for (const row of table.rows) {
      const value = row.values[variable];
      if (value !== undefined && Number.isFinite(value)) {
        sum += Math.abs(value);
        count += 1;
      }
    }
    return { variable, meanAbs: count === 0 ? null : sum / count };
  });
}

const single = (variables: readonly string[]): AxisGroups => ({
  split: false,
  primary: [...variables],
  secondary: [],
});

/**
 * Splits variables by magnitude.
 *
 * Variables with a zero or missing mean never drive the decision and stay on
 * the primary axis. The larger group is primary; on a tie the high-magnitude
 * group goes to the secondary axis. Both groups keep the input order.
 */
export function partitionByMagnitude(magnitudes: readonly VariableMagnitude[]): AxisGroups {
  const variables = magnitudes.map((magnitude) => magnitude.variable);
  const qualifying: { variable: string; mean: number }[] = [];
  for (const magnitude of magnitudes) {
    if (magnitude.meanAbs !== null && magnitude.meanAbs > 0) {
      qualifying.push({ variable: magnitude.variable, mean: magnitude.meanAbs });
    }
  }

  if (qualifying.length < 2) {
    return single(variables);
  }

  const sorted = [...qualifying].sort((a, b) => a.mean - b.mean);
  const smallest = sorted[0];
  const largest = sorted[sorted.length - 1];
  if (smallest === undefined || largest === undefined) {
    return single(variables);
  }
  if (largest.mean / smallest.mean <= MAX_SHARED_RATIO) {
    return single(variables);
  }

  const logs = sorted.map((entry) => Math.log10(entry.mean));
  let gapIndex = 0;
  let gap = -Infinity;
  for (let i = 1; i < logs.length; i++) {
    const current = (logs[i] ?? 0) - (logs[i - 1] ?? 0);
    if (current > gap) {
      gap = current;
      gapIndex = i;
    }
  }
  if (gap < MIN_LOG_GAP) {
    return single(variables);
  }

  const high = new Set(sorted.slice(gapIndex).map((entry) => entry.variable));
  const low = new Set(sorted.slice(0, gapIndex).map((entry) => entry.variable));
  const secondaryGroup = high.size > low.size ? low : high;

  const primary = variables.filter((variable) => !secondaryGroup.has(variable));
  const secondary = variables.filter((variable) => secondaryGroup.has(variable));

  return { split: true, primary, secondary };
}

/**
 * Axis groups for the given variables of a table.
 */
export const partitionAxes = (table: ValueRows, variables: readonly string[]): AxisGroups =>
  partitionByMagnitude(meanAbsoluteValues(table, variables));
