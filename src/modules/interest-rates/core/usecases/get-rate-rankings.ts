/**
 * Get Rate Rankings Use Case
 *
 * Highest and lowest rates of each ranked modality among the snapshots.
 */

import { err, ok, type Result } from 'neverthrow';

import { rankedModalities } from '../catalog.js';
import { rankModalityRates } from '../logic.js';

import type { InterestRateCatalog, ModalityRanking, ModalitySnapshot } from '../types.js';
import type { MalformedInputError } from '@/common/types/errors.js';

export interface GetRateRankingsDeps {
  catalog: InterestRateCatalog;
  topN: number;
}

export interface GetRateRankingsInput {
  snapshots: readonly ModalitySnapshot[];
}

export function getRateRankings(
  deps: GetRateRankingsDeps,
  input: GetRateRankingsInput
): Result<ModalityRanking[], MalformedInputError> {
  const { catalog, topN } = deps;
  const rankings: ModalityRanking[] = [];

  for (const modality of rankedModalities(catalog)) {
    const snapshot = input.snapshots.find((candidate) => candidate.modality === modality.name);
    if (snapshot === undefined) continue;

    const ranking = rankModalityRates(snapshot.rows, catalog.columns, topN);
    if (ranking.isErr()) {
      return err(ranking.error);
    }

    rankings.push({
      modality: snapshot.modality,
      shortLabel: snapshot.shortLabel,
      referenceDate: snapshot.referenceDate,
      total: ranking.value.total,
      largest: ranking.value.top,
      smallest: ranking.value.bottom,
    });
  }

  return ok(rankings);
}
