/**
 * Date-aware JSON serialization for cache values.
 * Tabular results carry Date cells that plain JSON would turn into strings.
 */

import { CacheError } from './ports.js';

const DATE_MARKER = '__date__';

/**
 * Replace Date instances with marked objects.
 * Must run before JSON.stringify because Date.toJSON() is called first.
 */
const transformDates = (value: unknown): unknown => {
  if (value instanceof Date) {
    return { [DATE_MARKER]: value.toISOString() };
  }

  if (Array.isArray(value)) {
    return value.map(transformDates);
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = transformDates(val);
    }
    return result;
  }

  return value;
};

const isDateMarker = (val: unknown): val is { [DATE_MARKER]: string } =>
  val !== null &&
  typeof val === 'object' &&
  DATE_MARKER in val &&
  typeof (val as Record<string, unknown>)[DATE_MARKER] === 'string';

export const serialize = (value: unknown): string => JSON.stringify(transformDates(value));

/**
 * Deserialize a JSON string, restoring Date instances.
 */
export const deserialize = (
  json: string
): { ok: true; value: unknown } | { ok: false; error: CacheError } => {
  try {
    const value = JSON.parse(json, (_key, val: unknown) =>
      isDateMarker(val) ? new Date(val[DATE_MARKER]) : val
    ) as unknown;
    return { ok: true, value };
  } catch (cause) {
    return {
      ok: false,
      error: CacheError.serialization('Failed to deserialize cached value', cause),
    };
  }
};
