/**
 * Institutions Module - Catalog validation
 *
 * Turns a schema-valid catalog file into an IfDataCatalog, rejecting
 * duplicate ids, variables without a source, and unknown thresholds.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createCatalogValidationError,
  findDuplicates,
  type CatalogValidationError,
} from '@/infra/catalogs/errors.js';

import type { IfDataCatalog, IfDataCatalogFile } from './types.js';

export function buildIfDataCatalog(
  file: IfDataCatalogFile
): Result<IfDataCatalog, CatalogValidationError> {
  const details: string[] = [];
  const ids = file.variables.map((variable) => variable.id);

  for (const duplicate of findDuplicates(ids)) {
    details.push(`variable id '${duplicate}' is declared more than once`);
  }

  for (const variable of file.variables) {
    const hasSource = variable.source !== undefined;
    const hasDerivation = variable.derivation !== undefined;
    if (hasSource === hasDerivation) {
      details.push(`variable '${variable.id}' needs exactly one of source or derivation`);
    }
  }

  const known = new Set(ids);
  for (const threshold of file.materiality) {
    if (!known.has(threshold.variable)) {
      details.push(`materiality threshold references unknown variable '${threshold.variable}'`);
    }
  }

  let displaySuffix: RegExp | undefined;
  try {
    displaySuffix = new RegExp(file.registry.displaySuffixPattern, 'g');
  } catch (error) {
    details.push(
      `display suffix pattern is not a valid expression: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (details.length > 0 || displaySuffix === undefined) {
    return err(createCatalogValidationError('ifdata', details));
  }

  return ok({
    registry: {
      columns: file.registry.columns,
      segments: file.registry.segments,
      namePattern: file.registry.namePattern,
    },
    displaySuffix,
    valueColumns: file.valueColumns,
    variables: file.variables,
    materiality: file.materiality,
  });
}
