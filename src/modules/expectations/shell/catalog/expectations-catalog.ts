import { makeCatalogFileReader, type CatalogError } from '@/infra/catalogs/index.js';

import { buildExpectationsCatalog } from '../../core/catalog.js';
import { ExpectationsCatalogFileSchema, type ExpectationsCatalog } from '../../core/types.js';

import type { Result } from 'neverthrow';

export const EXPECTATIONS_CATALOG_FILE = 'market-expectations.yaml';

export const loadExpectationsCatalog = async (
  catalogDir: string
): Promise<Result<ExpectationsCatalog, CatalogError>> => {
  const reader = makeCatalogFileReader(catalogDir, ExpectationsCatalogFileSchema);
  const file = await reader.read(EXPECTATIONS_CATALOG_FILE);
  return file.andThen(buildExpectationsCatalog);
};
