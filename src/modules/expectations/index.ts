/**
 * Expectations Module Public API
 *
 * Annual market expectations of the latest survey, per indicator.
 */

export {
  ExpectationsCatalogFileSchema,
  type ExpectationsCatalog,
  type ExpectationsCatalogFile,
  type ExpectationColumns,
  type IndicatorDefinition,
  type ExpectationRow,
  type IndicatorExpectations,
} from './core/types.js';

export type { ExpectationsError, UnknownIndicatorError } from './core/errors.js';
export { createUnknownIndicatorError } from './core/errors.js';

export { defaultReferenceYears, latestExpectations } from './core/logic.js';
export { buildExpectationsCatalog, findIndicator } from './core/catalog.js';

export type { ExpectationsRepository } from './core/ports.js';

export {
  getMarketExpectations,
  type GetMarketExpectationsDeps,
  type GetMarketExpectationsInput,
} from './core/usecases/get-market-expectations.js';

export { makeExpectationsRepo, type ExpectationsRepoDeps } from './shell/repo/expectations-repo.js';
export {
  loadExpectationsCatalog,
  EXPECTATIONS_CATALOG_FILE,
} from './shell/catalog/expectations-catalog.js';
