/**
 * Get Delinquency Map Use Case
 *
 * Latest PF and PJ rates of every state and region. A failed fetch leaves
 * that rate missing; states are shaded within their region by the mean of
 * their available rates.
 */

import { valueOrEmpty } from '@/common/types/no-data.js';
import { latestValue } from '@/modules/snapshot/index.js';

import { allStates } from '../catalog.js';
import { buildDelinquencyMap } from '../logic.js';
import { DELINQUENCY_MODES } from '../types.js';

import type { DelinquencyRepository } from '../ports.js';
import type { DelinquencyCatalog, DelinquencyMap, Location, ModeValues } from '../types.js';
import type { Logger } from 'pino';

export interface GetDelinquencyMapDeps {
  repo: DelinquencyRepository;
  catalog: DelinquencyCatalog;
  logger: Logger;
}

const fetchLatestModes = async (
  deps: GetDelinquencyMapDeps,
  location: Location
): Promise<ModeValues> => {
  const { repo, logger } = deps;
  const [pf = null, pj = null] = await Promise.all(
    DELINQUENCY_MODES.map(async (mode) => {
      const series = valueOrEmpty(await repo.getLast(location, mode, 1), [], logger, {
        ...location,
        mode,
      });
      return latestValue(series)?.value ?? null;
    })
  );
  return { pf, pj };
};

export async function getDelinquencyMap(deps: GetDelinquencyMapDeps): Promise<DelinquencyMap> {
  const { catalog } = deps;

  const states = allStates(catalog);
  const [stateValues, regionValues] = await Promise.all([
    Promise.all(states.map((state) => fetchLatestModes(deps, { kind: 'state', code: state.code }))),
    Promise.all(
      catalog.regions.map((region) => fetchLatestModes(deps, { kind: 'region', code: region.code }))
    ),
  ]);

  const byCode = (codes: readonly string[], values: readonly ModeValues[]) =>
    new Map(
      codes.flatMap((code, index) => {
        const entry = values[index];
        return entry === undefined ? [] : [[code, entry] as const];
      })
    );

  return buildDelinquencyMap(
    catalog,
    byCode(
      states.map((state) => state.code),
      stateValues
    ),
    byCode(
      catalog.regions.map((region) => region.code),
      regionValues
    )
  );
}
