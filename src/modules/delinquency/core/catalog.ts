import { err, ok, type Result } from 'neverthrow';

import {
  createCatalogValidationError,
  findDuplicates,
  type CatalogValidationError,
} from '@/infra/catalogs/errors.js';
import { hexToRgb, type Rgb } from '@/modules/geo-shading/index.js';

import { createUnknownStateError, type UnknownStateError } from './errors.js';

import type {
  DelinquencyCatalog,
  DelinquencyCatalogFile,
  DelinquencyMode,
  Location,
  RegionDefinition,
  StateDefinition,
} from './types.js';

export function buildDelinquencyCatalog(
  file: DelinquencyCatalogFile
): Result<DelinquencyCatalog, CatalogValidationError> {
  const details: string[] = [];

  for (const code of findDuplicates(file.regions.map((region) => region.code))) {
    details.push(`region '${code}' is declared more than once`);
  }
  const stateCodes = file.regions.flatMap((region) => region.states.map((state) => state.code));
  for (const code of findDuplicates(stateCodes)) {
    details.push(`state '${code}' belongs to more than one region`);
  }

  const palette: Record<string, Rgb> = {};
  for (const region of file.regions) {
    const color = hexToRgb(region.color);
    if (color === null) {
      details.push(`region '${region.code}' has an invalid colour '${region.color}'`);
      continue;
    }
    palette[region.code] = color;
  }

  const fallbackColor = hexToRgb(file.fallbackColor);
  if (fallbackColor === null) {
    details.push(`invalid fallback colour '${file.fallbackColor}'`);
  }

  if (details.length > 0 || fallbackColor === null) {
    return err(createCatalogValidationError('delinquency regions', details));
  }

  return ok({
    regions: file.regions,
    seriesMonths: file.seriesMonths,
    palette,
    fallbackColor,
  });
}

/**
 * States of every region, sorted by code.
 */
export const allStates = (catalog: DelinquencyCatalog): StateDefinition[] =>
  catalog.regions
    .flatMap((region) => region.states)
    .sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));

export function findStateRegion(
  catalog: DelinquencyCatalog,
  stateCode: string
): Result<{ state: StateDefinition; region: RegionDefinition }, UnknownStateError> {
  for (const region of catalog.regions) {
    const state = region.states.find((candidate) => candidate.code === stateCode);
    if (state !== undefined) {
      return ok({ state, region });
    }
  }
  return err(createUnknownStateError(stateCode));
}

/**
 * SGS code of the series of a location, or null when the catalog does not
 * list it.
 */
export function sgsCodeOf(
  catalog: DelinquencyCatalog,
  location: Location,
  mode: DelinquencyMode
): number | null {
  if (location.kind === 'region') {
    const region = catalog.regions.find((candidate) => candidate.code === location.code);
    return region?.sgs[mode] ?? null;
  }
  const found = findStateRegion(catalog, location.code);
  return found.isOk() ? found.value.state.sgs[mode] : null;
}
