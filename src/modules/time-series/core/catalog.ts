import { err, ok, type Result } from 'neverthrow';

import {
  createCatalogValidationError,
  findDuplicates,
  type CatalogValidationError,
} from '@/infra/catalogs/errors.js';

import type { SeriesCatalog, SeriesCatalogFile, SeriesDefinition } from './types.js';

export function buildSeriesCatalog(
  file: SeriesCatalogFile
): Result<SeriesCatalog, CatalogValidationError> {
  const details: string[] = [];

  for (const key of findDuplicates(file.categories.map((category) => category.key))) {
    details.push(`category '${key}' is declared more than once`);
  }
  const codes = file.categories.flatMap((category) =>
    category.series.map((series) => String(series.code))
  );
  for (const code of findDuplicates(codes)) {
    details.push(`series ${code} is listed more than once`);
  }

  if (details.length > 0) {
    return err(createCatalogValidationError('sgs series', details));
  }

  const byCode = new Map<number, SeriesDefinition>();
  for (const category of file.categories) {
    for (const series of category.series) {
      byCode.set(series.code, series);
    }
  }

  return ok({ categories: file.categories, byCode });
}
