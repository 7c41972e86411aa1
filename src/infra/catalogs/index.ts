export {
  createCatalogValidationError,
  findDuplicates,
  type CatalogError,
  type CatalogReadError,
  type CatalogParseError,
  type CatalogSchemaError,
  type CatalogValidationError,
} from './errors.js';
export { makeCatalogFileReader, type CatalogFileReader } from './yaml-loader.js';
