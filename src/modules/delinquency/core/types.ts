/**
 * Delinquency Module - Types
 */

import { Type, type Static } from '@sinclair/typebox';

import type { Series } from '@/common/types/series.js';
import type { Rgb } from '@/modules/geo-shading/index.js';

const HexColor = Type.String({ pattern: '^#[0-9A-Fa-f]{6}$' });

/** SGS codes of the PF and PJ non-performing loan series */
const SgsCodes = Type.Object({
  pf: Type.Integer({ minimum: 1 }),
  pj: Type.Integer({ minimum: 1 }),
});

export const DelinquencyCatalogFileSchema = Type.Object({
  fallbackColor: HexColor,
  seriesMonths: Type.Integer({ minimum: 1 }),
  regions: Type.Array(
    Type.Object({
      code: Type.String({ minLength: 1 }),
      name: Type.String({ minLength: 1 }),
      color: HexColor,
      sgs: SgsCodes,
      states: Type.Array(
        Type.Object({
          code: Type.String({ minLength: 2, maxLength: 2 }),
          name: Type.String({ minLength: 1 }),
          sgs: SgsCodes,
        }),
        { minItems: 1 }
      ),
    }),
    { minItems: 1 }
  ),
});

export type DelinquencyCatalogFile = Static<typeof DelinquencyCatalogFileSchema>;

export type RegionDefinition = DelinquencyCatalogFile['regions'][number];

export type StateDefinition = RegionDefinition['states'][number];

export interface DelinquencyCatalog {
  readonly regions: readonly RegionDefinition[];
  /** Length of the regional history charts */
  readonly seriesMonths: number;
  /** Base colour per region code */
  readonly palette: Readonly<Record<string, Rgb>>;
  readonly fallbackColor: Rgb;
}

/** Borrower type: individuals (PF) or companies (PJ) */
export type DelinquencyMode = 'pf' | 'pj';

export const DELINQUENCY_MODES: readonly DelinquencyMode[] = ['pf', 'pj'];

/**
 * Region and state codes overlap ('SE' is Sudeste and Sergipe),
 * so a location always carries its kind.
 */
export interface Location {
  readonly kind: 'region' | 'state';
  readonly code: string;
}

export interface ModeValues {
  readonly pf: number | null;
  readonly pj: number | null;
}

export interface StateDelinquency extends ModeValues {
  readonly code: string;
  readonly name: string;
  readonly region: string;
  readonly regionName: string;
  /** Mean of the available PF and PJ rates */
  readonly average: number | null;
  readonly factor: number;
  /** `#rrggbb` fill of the state */
  readonly color: string;
}

export interface RegionDelinquency extends ModeValues {
  readonly code: string;
  readonly name: string;
  /** `#rrggbb` base colour */
  readonly color: string;
}

export interface DelinquencyMap {
  readonly states: readonly StateDelinquency[];
  readonly regions: readonly RegionDelinquency[];
}

export interface RegionSeries {
  readonly region: string;
  readonly name: string;
  readonly color: string;
  readonly series: Series;
}

export interface RegionalSeries {
  readonly pf: readonly RegionSeries[];
  readonly pj: readonly RegionSeries[];
}

export interface StateComparison {
  readonly state: StateDefinition;
  readonly region: RegionDefinition;
  readonly pf: { readonly state: Series; readonly region: Series };
  readonly pj: { readonly state: Series; readonly region: Series };
}

export type DownloadScope = 'regions' | 'states';
