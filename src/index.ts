/**
 * Data-transformation core of the Banco Central open-data dashboard.
 *
 * Each module is exported as a namespace; shared types and the core factory
 * are exported at the top level.
 */

export * from './common/types/index.js';

export {
  buildCore,
  loadCatalogs,
  type BuildCoreOptions,
  type Core,
  type CoreCatalogs,
  type CoreRepos,
} from './app/build-core.js';
export { createConfig, parseEnv, type AppConfig, type Env } from './infra/config/env.js';
export { createLogger, componentLogger, type Logger } from './infra/logger/index.js';
export type { CatalogError } from './infra/catalogs/index.js';

export * as formatting from './modules/formatting/index.js';
export * as series from './modules/series/index.js';
export * as snapshot from './modules/snapshot/index.js';
export * as ranking from './modules/ranking/index.js';
export * as statistics from './modules/statistics/index.js';
export * as chartAxis from './modules/chart-axis/index.js';
export * as geoShading from './modules/geo-shading/index.js';
export * as instantPayments from './modules/instant-payments/index.js';
export * as institutions from './modules/institutions/index.js';
export * as interestRates from './modules/interest-rates/index.js';
export * as expectations from './modules/expectations/index.js';
export * as delinquency from './modules/delinquency/index.js';
export * as timeSeries from './modules/time-series/index.js';
export * as dataExport from './modules/export/index.js';
