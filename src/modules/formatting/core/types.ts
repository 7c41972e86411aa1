/**
 * Formatting Module - Types
 */

/**
 * Display unit declared per variable in the variable catalogs.
 */
export type DisplayUnit = 'currency' | 'percent' | 'index';

/**
 * Placeholder shown for a missing value.
 */
export const MISSING_PLACEHOLDER = '—';
