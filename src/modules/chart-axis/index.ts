/**
 * Chart Axis Module Public API
 *
 * Single or dual value axis for variables charted together.
 */

export type { AxisGroups, ValueRows, VariableMagnitude } from './core/types.js';

export {
  partitionAxes,
  partitionByMagnitude,
  meanAbsoluteValues,
  MAX_SHARED_RATIO,
  MIN_LOG_GAP,
} from './core/logic.js';
