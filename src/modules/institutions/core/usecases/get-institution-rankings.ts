/**
 * Get Institution Rankings Use Case
 *
 * Largest/smallest buckets per variable over the material institutions
 * of a snapshot the caller already holds.
 */

import { rankingBuckets } from '@/modules/ranking/index.js';

import { applyMaterialityFilter } from '../logic.js';

import type { IfDataCatalog, VariableRanking } from '../types.js';
import type { WideTable } from '@/common/types/wide-table.js';

export interface GetInstitutionRankingsDeps {
  catalog: IfDataCatalog;
  /** Rows per bucket */
  topN: number;
}

export interface GetInstitutionRankingsInput {
  table: WideTable;
  /** Variable ids; defaults to the whole catalog */
  variableIds?: readonly string[];
}

export interface InstitutionRankings {
  /** Institutions left after the materiality filter */
  readonly institutionCount: number;
  readonly rankings: readonly VariableRanking[];
}

export function getInstitutionRankings(
  deps: GetInstitutionRankingsDeps,
  input: GetInstitutionRankingsInput
): InstitutionRankings {
  const { catalog, topN } = deps;
  const material = applyMaterialityFilter(input.table, catalog.materiality);

  const requested =
    input.variableIds === undefined
      ? catalog.variables
      : catalog.variables.filter((variable) => input.variableIds?.includes(variable.id) === true);

  const rankings = requested.map((variable): VariableRanking => {
    const buckets = material.variables.includes(variable.id)
      ? rankingBuckets(material, variable.id, variable, topN)
      : null;

    return {
      variableId: variable.id,
      label: variable.label,
      displayUnit: variable.displayUnit,
      buckets: buckets !== null && buckets.total > 0 ? buckets : null,
    };
  });

  return { institutionCount: material.rows.length, rankings };
}
