/**
 * Geo Shading Module - Types
 */

export interface Rgb {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/**
 * One area (e.g. a state) to shade within its group (e.g. a region).
 */
export interface ShadingItem {
  readonly id: string;
  readonly group: string;
  /** null when the area has no value */
  readonly value: number | null;
}

export interface ShadedItem extends ShadingItem {
  /** Position of the value within its group, in [0, 1] */
  readonly factor: number;
  /** `#rrggbb` */
  readonly color: string;
}
