/**
 * Formatting Module - Pure Functions
 *
 * pt-BR number rendering: `.` groups thousands, `,` separates decimals.
 */

import { MISSING_PLACEHOLDER, type DisplayUnit } from './types.js';

const formatterCache = new Map<number, Intl.NumberFormat>();

const getFormatter = (decimals: number): Intl.NumberFormat => {
  let formatter = formatterCache.get(decimals);
  if (formatter === undefined) {
    formatter = new Intl.NumberFormat('pt-BR', {
      minimumFractionDigits: decimals,
      maximumFractionDigits: decimals,
      useGrouping: true,
    });
    formatterCache.set(decimals, formatter);
  }
  return formatter;
};

const isMissing = (value: number | null | undefined): value is null | undefined =>
  value === null || value === undefined || !Number.isFinite(value);

/**
 * Fixed-decimal pt-BR rendering.
 */
export function formatDecimal(value: number | null | undefined, decimals = 2): string {
  if (isMissing(value)) return MISSING_PLACEHOLDER;
  return getFormatter(decimals).format(value);
}

const COMPACT_STEPS: readonly { threshold: number; suffix: string; decimals: number }[] = [
  { threshold: 1e12, suffix: 'T', decimals: 2 },
  { threshold: 1e9, suffix: 'B', decimals: 2 },
  { threshold: 1e6, suffix: 'M', decimals: 2 },
  { threshold: 1e3, suffix: 'K', decimals: 1 },
];

/**
 * Compact magnitude notation: `1,50B`, `12,3K`, `950`.
 * The suffix is chosen on the absolute value; the sign is kept.
 */
export function formatCompactNumber(value: number | null | undefined, decimals = 0): string {
  if (isMissing(value)) return MISSING_PLACEHOLDER;

  const magnitude = Math.abs(value);
  for (const step of COMPACT_STEPS) {
    if (magnitude >= step.threshold) {
      return `${getFormatter(step.decimals).format(value / step.threshold)}${step.suffix}`;
    }
  }
  return getFormatter(decimals).format(value);
}

export function formatCurrency(value: number | null | undefined): string {
  if (isMissing(value)) return MISSING_PLACEHOLDER;
  return `R$ ${formatCompactNumber(value)}`;
}

/**
 * Renders a fraction as a signed percentage: 0.1234 → `+12,34%`.
 * Only strictly positive values get the plus sign.
 */
export function formatSignedPercent(fraction: number | null | undefined): string {
  if (isMissing(fraction)) return MISSING_PLACEHOLDER;
  const sign = fraction > 0 ? '+' : '';
  return `${sign}${getFormatter(2).format(fraction * 100)}%`;
}

/**
 * Renders a catalog variable according to its display unit.
 * Currency values are in BRL: billions as `bi`, millions as `mi`.
 */
export function formatVariableValue(value: number | null | undefined, unit: DisplayUnit): string {
  if (isMissing(value)) return MISSING_PLACEHOLDER;

  switch (unit) {
    case 'percent':
      return `${getFormatter(2).format(value)}%`;
    case 'index':
      return getFormatter(2).format(value);
    case 'currency': {
      const magnitude = Math.abs(value);
      if (magnitude >= 1e9) return `R$ ${getFormatter(1).format(value / 1e9)} bi`;
      if (magnitude >= 1e6) return `R$ ${getFormatter(1).format(value / 1e6)} mi`;
      return `R$ ${getFormatter(0).format(value)}`;
    }
  }
}
