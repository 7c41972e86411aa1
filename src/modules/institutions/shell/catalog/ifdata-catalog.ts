import { makeCatalogFileReader, type CatalogError } from '@/infra/catalogs/index.js';

import { buildIfDataCatalog } from '../../core/catalog.js';
import { IfDataCatalogFileSchema, type IfDataCatalog } from '../../core/types.js';

import type { Result } from 'neverthrow';

export const IFDATA_CATALOG_FILE = 'ifdata.yaml';

/**
 * Reads and validates the IF.Data variable catalog.
 */
export const loadIfDataCatalog = async (
  catalogDir: string
): Promise<Result<IfDataCatalog, CatalogError>> => {
  const reader = makeCatalogFileReader(catalogDir, IfDataCatalogFileSchema);
  const file = await reader.read(IFDATA_CATALOG_FILE);
  return file.andThen(buildIfDataCatalog);
};
