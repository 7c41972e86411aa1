import { makeCatalogFileReader, type CatalogError } from '@/infra/catalogs/index.js';

import { buildSeriesCatalog } from '../../core/catalog.js';
import { SeriesCatalogFileSchema, type SeriesCatalog } from '../../core/types.js';

import type { Result } from 'neverthrow';

export const SERIES_CATALOG_FILE = 'sgs-series.yaml';

export const loadSeriesCatalog = async (
  catalogDir: string
): Promise<Result<SeriesCatalog, CatalogError>> => {
  const reader = makeCatalogFileReader(catalogDir, SeriesCatalogFileSchema);
  const file = await reader.read(SERIES_CATALOG_FILE);
  return file.andThen(buildSeriesCatalog);
};
