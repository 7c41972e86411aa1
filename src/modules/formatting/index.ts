/**
 * Formatting Module Public API
 *
 * Locale-aware rendering of magnitudes, currency and percentages.
 */

// ============================================================================
// Types
// ============================================================================

export { MISSING_PLACEHOLDER, type DisplayUnit } from './core/types.js';

// ============================================================================
// Logic
// ============================================================================

export {
  formatCompactNumber,
  formatCurrency,
  formatDecimal,
  formatSignedPercent,
  formatVariableValue,
} from './core/logic.js';
