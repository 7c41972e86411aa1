import { makeCatalogFileReader, type CatalogError } from '@/infra/catalogs/index.js';

import { buildDelinquencyCatalog } from '../../core/catalog.js';
import { DelinquencyCatalogFileSchema, type DelinquencyCatalog } from '../../core/types.js';

import type { Result } from 'neverthrow';

export const DELINQUENCY_CATALOG_FILE = 'delinquency-regions.yaml';

export const loadDelinquencyCatalog = async (
  catalogDir: string
): Promise<Result<DelinquencyCatalog, CatalogError>> => {
  const reader = makeCatalogFileReader(catalogDir, DelinquencyCatalogFileSchema);
  const file = await reader.read(DELINQUENCY_CATALOG_FILE);
  return file.andThen(buildDelinquencyCatalog);
};
