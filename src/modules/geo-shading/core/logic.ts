/**
 * Geo Shading Module - Pure Functions
 *
 * Areas are tinted from their group's base colour towards white: the lowest
 * value of a group gets the lightest shade, the highest the base colour.
 */

import type { Rgb, ShadedItem, ShadingItem } from './types.js';

/** Factor used when a value cannot be placed within its group */
export const NEUTRAL_FACTOR = 0.5;

/** Share of the base colour at factor 0 */
const MIN_BLEND = 0.3;

const clampChannel = (value: number): number => Math.min(255, Math.max(0, value));

/**
 * `#rrggbb` (or `rrggbb`) to channels. Null for anything else.
 */
export function hexToRgb(hex: string): Rgb | null {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex.trim());
  if (match === null) return null;
  const [, r = '', g = '', b = ''] = match;
  return { r: parseInt(r, 16), g: parseInt(g, 16), b: parseInt(b, 16) };
}

export function rgbToHex(color: Rgb): string {
  const channel = (value: number): string =>
    clampChannel(Math.round(value)).toString(16).padStart(2, '0');
  return `#${channel(color.r)}${channel(color.g)}${channel(color.b)}`;
}

/**
 * Normalized position of a value between a group's min and max, clamped to
 * [0, 1]. Neutral when the value is missing or the range is empty.
 */
export function intensityFactor(value: number | null, min: number, max: number): number {
  if (value === null || !Number.isFinite(value) || !(max > min)) {
    return NEUTRAL_FACTOR;
  }
  return Math.min(1, Math.max(0, (value - min) / (max - min)));
}

/**
 * Blends the base colour with white; factor 1 is the base colour itself.
 */
export function shadeColor(base: Rgb, factor: number): Rgb {
  const blend = MIN_BLEND + (1 - MIN_BLEND) * factor;
  const mix = (channel: number): number =>
    clampChannel(Math.round(channel * blend + 255 * (1 - blend)));
  return { r: mix(base.r), g: mix(base.g), b: mix(base.b) };
}

/**
 * Shades every item against the value range of its own group.
 * Items of a group missing from the palette use `fallback`.
 */
export function shadeByGroup(
  items: readonly ShadingItem[],
  palette: Readonly<Record<string, Rgb>>,
  fallback: Rgb
): ShadedItem[] {
  const ranges = new Map<string, { min: number; max: number }>();
  for (const item of items) {
    if (item.value === null || !Number.isFinite(item.value)) continue;
    const range = ranges.get(item.group);
    if (range === undefined) {
      ranges.set(item.group, { min: item.value, max: item.value });
    } else {
      range.min = Math.min(range.min, item.value);
      range.max = Math.max(range.max, item.value);
    }
  }

  return items.map((item) => {
    const range = ranges.get(item.group);
    const factor =
      range === undefined ? NEUTRAL_FACTOR : intensityFactor(item.value, range.min, range.max);
    const base = palette[item.group] ?? fallback;
    return { ...item, factor, color: rgbToHex(shadeColor(base, factor)) };
  });
}
