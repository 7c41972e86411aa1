/**
 * Get Institution Profile Use Case
 *
 * Every catalog variable of one institution, formatted, with its position
 * among all institutions of the snapshot (no materiality filter).
 */

import { err, ok, type Result } from 'neverthrow';

import { wideValue, type WideTable } from '@/common/types/wide-table.js';
import { formatVariableValue } from '@/modules/formatting/index.js';
import { computeRankPosition } from '@/modules/ranking/index.js';

import { createInstitutionNotFoundError, type InstitutionNotFoundError } from '../errors.js';

import type { IfDataCatalog, InstitutionProfile, ProfileEntry } from '../types.js';

export interface GetInstitutionProfileDeps {
  catalog: IfDataCatalog;
}

export interface GetInstitutionProfileInput {
  table: WideTable;
  entityId: string;
}

export function getInstitutionProfile(
  deps: GetInstitutionProfileDeps,
  input: GetInstitutionProfileInput
): Result<InstitutionProfile, InstitutionNotFoundError> {
  const { table, entityId } = input;
  const row = table.rows.find((candidate) => candidate.entityId === entityId);
  if (row === undefined) {
    return err(createInstitutionNotFoundError(entityId));
  }

  const entries = deps.catalog.variables
    .filter((variable) => table.variables.includes(variable.id))
    .map((variable): ProfileEntry => {
      const value = wideValue(row, variable.id);
      return {
        variableId: variable.id,
        label: variable.label,
        displayUnit: variable.displayUnit,
        value,
        formattedValue: formatVariableValue(value, variable.displayUnit),
        position:
          value === null
            ? null
            : computeRankPosition(table, entityId, variable.id, variable.sortDirection),
      };
    });

  return ok({ entityId: row.entityId, entityName: row.entityName, entries });
}

/**
 * Institutions of a snapshot, ordered by display name, for a selector.
 */
export const listInstitutions = (table: WideTable): { entityId: string; entityName: string }[] =>
  table.rows
    .map((row) => ({ entityId: row.entityId, entityName: row.entityName }))
    .sort((a, b) => a.entityName.localeCompare(b.entityName, 'pt-BR'));
