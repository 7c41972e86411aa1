/**
 * Geo Shading Module Public API
 */

export type { Rgb, ShadingItem, ShadedItem } from './core/types.js';

export {
  hexToRgb,
  rgbToHex,
  intensityFactor,
  shadeColor,
  shadeByGroup,
  NEUTRAL_FACTOR,
} from './core/logic.js';
