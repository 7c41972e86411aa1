/**
 * Errors raised while loading catalog files at startup.
 */

export interface CatalogReadError {
  readonly type: 'CatalogReadError';
  readonly message: string;
  readonly file: string;
}

export interface CatalogParseError {
  readonly type: 'CatalogParseError';
  readonly message: string;
  readonly file: string;
}

export interface CatalogSchemaError {
  readonly type: 'CatalogSchemaError';
  readonly message: string;
  readonly file: string;
  readonly details: string[];
}

/**
 * The file is well-formed but its entries contradict each other
 * (duplicate ids, unknown references).
 */
export interface CatalogValidationError {
  readonly type: 'CatalogValidationError';
  readonly message: string;
  readonly details: string[];
}

export type CatalogError =
  | CatalogReadError
  | CatalogParseError
  | CatalogSchemaError
  | CatalogValidationError;

export const createCatalogValidationError = (
  catalog: string,
  details: string[]
): CatalogValidationError => ({
  type: 'CatalogValidationError',
  message: `Catalog '${catalog}' is inconsistent: ${details.join('; ')}`,
  details,
});

/**
 * Collects duplicated values of a key, in first-seen order.
 */
export const findDuplicates = (values: readonly string[]): string[] => {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      duplicates.add(value);
    }
    seen.add(value);
  }
  return Array.from(duplicates);
};
