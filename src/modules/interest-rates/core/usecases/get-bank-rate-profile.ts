/**
 * Get Bank Rate Profile Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { formatDecimal } from '@/modules/formatting/index.js';

import { bankRatePosition, collectInstitutions } from '../logic.js';

import type {
  BankRateEntry,
  BankRateProfile,
  InterestRateCatalog,
  ModalitySnapshot,
} from '../types.js';
import type { MalformedInputError } from '@/common/types/errors.js';

export interface GetBankRateProfileDeps {
  catalog: InterestRateCatalog;
}

export interface GetBankRateProfileInput {
  snapshots: readonly ModalitySnapshot[];
  institution: string;
}

/**
 * Rate and position of one institution in every modality it operates in,
 * in catalog order.
 */
export function getBankRateProfile(
  deps: GetBankRateProfileDeps,
  input: GetBankRateProfileInput
): Result<BankRateProfile, MalformedInputError> {
  const { catalog } = deps;
  const entries: BankRateEntry[] = [];

  for (const modality of catalog.modalities) {
    const snapshot = input.snapshots.find((candidate) => candidate.modality === modality.name);
    if (snapshot === undefined) continue;

    const result = bankRatePosition(snapshot.rows, catalog.columns, input.institution);
    if (result.isErr()) {
      return err(result.error);
    }
    const found = result.value;
    if (found === null) continue;

    entries.push({
      modality: snapshot.modality,
      shortLabel: snapshot.shortLabel,
      rate: found.rate,
      formattedRate: formatDecimal(found.rate, 2),
      position: found.position,
    });
  }

  return ok({ institution: input.institution, entries });
}

export const listRateInstitutions = (
  deps: GetBankRateProfileDeps,
  snapshots: readonly ModalitySnapshot[]
): string[] => collectInstitutions(snapshots, deps.catalog.columns.institution);
