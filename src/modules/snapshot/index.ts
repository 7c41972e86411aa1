/**
 * Snapshot Module Public API
 *
 * Isolates the rows of a time-stamped table at its latest (or a target) date.
 */

export type { LatestSnapshotOptions } from './core/types.js';

export { filterLatestSnapshot, latestValue } from './core/logic.js';
