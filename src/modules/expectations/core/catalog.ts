import { err, ok, type Result } from 'neverthrow';

import {
  createCatalogValidationError,
  findDuplicates,
  type CatalogValidationError,
} from '@/infra/catalogs/errors.js';

import { createUnknownIndicatorError, type UnknownIndicatorError } from './errors.js';

import type { ExpectationsCatalog, ExpectationsCatalogFile, IndicatorDefinition } from './types.js';

export function buildExpectationsCatalog(
  file: ExpectationsCatalogFile
): Result<ExpectationsCatalog, CatalogValidationError> {
  const duplicates = findDuplicates(file.indicators.map((indicator) => indicator.name));
  if (duplicates.length > 0) {
    return err(
      createCatalogValidationError(
        'market expectations',
        duplicates.map((name) => `indicator '${name}' is declared more than once`)
      )
    );
  }
  return ok(file);
}

export function findIndicator(
  catalog: ExpectationsCatalog,
  name: string
): Result<IndicatorDefinition, UnknownIndicatorError> {
  const indicator = catalog.indicators.find((candidate) => candidate.name === name);
  return indicator === undefined ? err(createUnknownIndicatorError(name)) : ok(indicator);
}
