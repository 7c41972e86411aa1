/**
 * Delinquency Module - Pure Functions
 */

import { formatIsoDate, startOfUtcDay } from '@/common/types/temporal.js';
import { NEUTRAL_FACTOR, rgbToHex, shadeByGroup } from '@/modules/geo-shading/index.js';
import { mean } from '@/modules/statistics/index.js';

import { allStates } from './catalog.js';

import type {
  DelinquencyCatalog,
  DelinquencyMap,
  DelinquencyMode,
  ModeValues,
  StateDelinquency,
} from './types.js';
import type { Series } from '@/common/types/series.js';
import type { Row } from '@/common/types/tabular.js';
import type { DateRange } from '@/infra/bcb/index.js';

const NO_VALUES: ModeValues = { pf: null, pj: null };

/**
 * Mean of the PF and PJ rates that are present.
 */
export function averageOfModes(values: ModeValues): number | null {
  const present = [values.pf, values.pj].filter(
    (value): value is number => value !== null && Number.isFinite(value)
  );
  return mean(present);
}

/**
 * Shades every state against the average rates of the other states of its
 * region, and attaches the region's own rates.
 */
export function buildDelinquencyMap(
  catalog: DelinquencyCatalog,
  stateValues: ReadonlyMap<string, ModeValues>,
  regionValues: ReadonlyMap<string, ModeValues>
): DelinquencyMap {
  const regionOf = new Map<string, { code: string; name: string }>();
  for (const region of catalog.regions) {
    for (const state of region.states) {
      regionOf.set(state.code, { code: region.code, name: region.name });
    }
  }

  const states = allStates(catalog);
  const shaded = shadeByGroup(
    states.map((state) => ({
      id: state.code,
      group: regionOf.get(state.code)?.code ?? '',
      value: averageOfModes(stateValues.get(state.code) ?? NO_VALUES),
    })),
    catalog.palette,
    catalog.fallbackColor
  );

  const stateRows: StateDelinquency[] = states.map((state, index) => {
    const values = stateValues.get(state.code) ?? NO_VALUES;
    const shade = shaded[index];
    return {
      code: state.code,
      name: state.name,
      region: regionOf.get(state.code)?.code ?? '',
      regionName: regionOf.get(state.code)?.name ?? '',
      pf: values.pf,
      pj: values.pj,
      average: shade?.value ?? null,
      factor: shade?.factor ?? NEUTRAL_FACTOR,
      color: shade?.color ?? rgbToHex(catalog.fallbackColor),
    };
  });

  return {
    states: stateRows,
    regions: catalog.regions.map((region) => {
      const values = regionValues.get(region.code) ?? NO_VALUES;
      return {
        code: region.code,
        name: region.name,
        color: rgbToHex(catalog.palette[region.code] ?? catalog.fallbackColor),
        pf: values.pf,
        pj: values.pj,
      };
    }),
  };
}

/**
 * From the first day of the month `months` months back to today.
 * SGS serves at most 20 observations through `ultimos`, so history is read by date.
 */
export function seriesWindow(today: Date, months: number): DateRange {
  return {
    start: new Date(Date.UTC(today.getUTCFullYear(), today.getUTCMonth() - months, 1)),
    end: startOfUtcDay(today),
  };
}

/**
 * Flat download rows of one location and mode:
 * `Date` (YYYY-MM-DD), `Valor`, `Local`, `Modo` (PF/PJ), `NomeLocal`.
 */
export function toDownloadRows(
  series: Series,
  location: string,
  mode: DelinquencyMode,
  locationName: string
): Row[] {
  return series.map((point) => ({
    Date: formatIsoDate(point.date),
    Valor: point.value,
    Local: location,
    Modo: mode.toUpperCase(),
    NomeLocal: locationName,
  }));
}
