/**
 * Common type exports
 */

export * from './result.js';
export * from './errors.js';
export * from './tabular.js';
export * from './temporal.js';
export * from './series.js';
export * from './wide-table.js';
export * from './no-data.js';
