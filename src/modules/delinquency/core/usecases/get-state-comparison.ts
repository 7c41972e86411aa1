/**
 * Get State Comparison Use Case
 *
 * PF and PJ history of a state next to its region's.
 */

import { err, ok, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';

import { findStateRegion } from '../catalog.js';
import { seriesWindow } from '../logic.js';

import type { DelinquencyError } from '../errors.js';
import type { DelinquencyRepository } from '../ports.js';
import type { DelinquencyCatalog, DelinquencyMode, Location, StateComparison } from '../types.js';
import type { Series } from '@/common/types/series.js';
import type { Logger } from 'pino';

export interface GetStateComparisonDeps {
  repo: DelinquencyRepository;
  catalog: DelinquencyCatalog;
  logger: Logger;
  now?: () => Date;
}

export interface GetStateComparisonInput {
  state: string;
}

export async function getStateComparison(
  deps: GetStateComparisonDeps,
  input: GetStateComparisonInput
): Promise<Result<StateComparison, DelinquencyError>> {
  const { repo, catalog, logger } = deps;

  const found = findStateRegion(catalog, input.state);
  if (found.isErr()) {
    return err(found.error);
  }
  const { state, region } = found.value;
  const range = seriesWindow((deps.now ?? (() => new Date()))(), catalog.seriesMonths);

  const fetch = async (location: Location, mode: DelinquencyMode): Promise<Series> =>
    valueOrEmpty(await repo.getSeries(location, mode, range), [], logger, { ...location, mode });

  const stateLocation: Location = { kind: 'state', code: state.code };
  const regionLocation: Location = { kind: 'region', code: region.code };
  const [statePf, statePj, regionPf, regionPj] = await Promise.all([
    fetch(stateLocation, 'pf'),
    fetch(stateLocation, 'pj'),
    fetch(regionLocation, 'pf'),
    fetch(regionLocation, 'pj'),
  ]);

  return ok({
    state,
    region,
    pf: { state: statePf, region: regionPf },
    pj: { state: statePj, region: regionPj },
  });
}
