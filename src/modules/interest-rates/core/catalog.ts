import { err, ok, type Result } from 'neverthrow';

import {
  createCatalogValidationError,
  findDuplicates,
  type CatalogValidationError,
} from '@/infra/catalogs/errors.js';

import { createUnknownModalityError, type UnknownModalityError } from './errors.js';

import type { InterestRateCatalog, InterestRateCatalogFile, ModalityDefinition } from './types.js';

export function buildInterestRateCatalog(
  file: InterestRateCatalogFile
): Result<InterestRateCatalog, CatalogValidationError> {
  const duplicates = findDuplicates(file.modalities.map((modality) => modality.name));
  if (duplicates.length > 0) {
    return err(
      createCatalogValidationError(
        'interest-rate modalities',
        duplicates.map((name) => `modality '${name}' is declared more than once`)
      )
    );
  }
  return ok(file);
}

export function findModality(
  catalog: InterestRateCatalog,
  name: string
): Result<ModalityDefinition, UnknownModalityError> {
  const modality = catalog.modalities.find((candidate) => candidate.name === name);
  return modality === undefined ? err(createUnknownModalityError(name)) : ok(modality);
}

/**
 * Modalities shown in the rankings, in catalog order.
 */
export const rankedModalities = (catalog: InterestRateCatalog): ModalityDefinition[] =>
  catalog.modalities.filter((modality) => modality.ranked);

export const dateColumnOf = (catalog: InterestRateCatalog, modality: ModalityDefinition): string =>
  catalog.endpoints[modality.frequency].dateColumn;
