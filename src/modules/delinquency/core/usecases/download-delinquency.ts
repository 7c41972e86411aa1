/**
 * Download Delinquency Use Case
 *
 * Raw PF and PJ rates of every region (or every state) within a date range,
 * one tagged row per observation.
 */

import { valueOrEmpty } from '@/common/types/no-data.js';

import { allStates } from '../catalog.js';
import { toDownloadRows } from '../logic.js';
import { DELINQUENCY_MODES } from '../types.js';

import type { DelinquencyRepository } from '../ports.js';
import type { DelinquencyCatalog, DownloadScope, Location } from '../types.js';
import type { Row } from '@/common/types/tabular.js';
import type { DateRange } from '@/infra/bcb/index.js';
import type { Logger } from 'pino';

export interface DownloadDelinquencyDeps {
  repo: DelinquencyRepository;
  catalog: DelinquencyCatalog;
  logger: Logger;
}

export interface DownloadDelinquencyInput {
  scope: DownloadScope;
  range: DateRange;
}

interface DownloadTarget {
  location: Location;
  name: string;
}

export async function downloadDelinquency(
  deps: DownloadDelinquencyDeps,
  input: DownloadDelinquencyInput
): Promise<Row[]> {
  const { repo, catalog, logger } = deps;

  const locations: DownloadTarget[] =
    input.scope === 'regions'
      ? catalog.regions.map((region): DownloadTarget => ({
          location: { kind: 'region', code: region.code },
          name: region.name,
        }))
      : allStates(catalog).map((state): DownloadTarget => ({
          location: { kind: 'state', code: state.code },
          name: state.name,
        }));

  const rows: Row[] = [];
  for (const { location, name } of locations) {
    for (const mode of DELINQUENCY_MODES) {
      const series = valueOrEmpty(await repo.getSeries(location, mode, input.range), [], logger, {
        ...location,
        mode,
      });
      rows.push(...toDownloadRows(series, location.code, mode, name));
    }
  }

  logger.debug({ scope: input.scope, rows: rows.length }, 'Delinquency download assembled');
  return rows;
}
