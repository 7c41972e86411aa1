import { makeCatalogFileReader, type CatalogError } from '@/infra/catalogs/index.js';

import { buildInterestRateCatalog } from '../../core/catalog.js';
import {
  InterestRateCatalogFileSchema,
  type InterestRateCatalog,
} from '../../core/types.js';

import type { Result } from 'neverthrow';

export const INTEREST_RATE_CATALOG_FILE = 'interest-rate-modalities.yaml';

export const loadInterestRateCatalog = async (
  catalogDir: string
): Promise<Result<InterestRateCatalog, CatalogError>> => {
  const reader = makeCatalogFileReader(catalogDir, InterestRateCatalogFileSchema);
  const file = await reader.read(INTEREST_RATE_CATALOG_FILE);
  return file.andThen(buildInterestRateCatalog);
};
