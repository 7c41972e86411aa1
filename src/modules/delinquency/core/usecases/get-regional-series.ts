/**
 * Get Regional Series Use Case
 *
 * PF and PJ history of every region over the catalog's window. Regions
 * without data are left out of the chart.
 */

import { valueOrEmpty } from '@/common/types/no-data.js';
import { rgbToHex } from '@/modules/geo-shading/index.js';

import { seriesWindow } from '../logic.js';

import type { DelinquencyRepository } from '../ports.js';
import type {
  DelinquencyCatalog,
  DelinquencyMode,
  RegionalSeries,
  RegionSeries,
} from '../types.js';
import type { Logger } from 'pino';

export interface GetRegionalSeriesDeps {
  repo: DelinquencyRepository;
  catalog: DelinquencyCatalog;
  logger: Logger;
  now?: () => Date;
}

export async function getRegionalSeries(deps: GetRegionalSeriesDeps): Promise<RegionalSeries> {
  const { repo, catalog, logger } = deps;
  const range = seriesWindow((deps.now ?? (() => new Date()))(), catalog.seriesMonths);

  const forMode = async (mode: DelinquencyMode): Promise<RegionSeries[]> => {
    const fetched = await Promise.all(
      catalog.regions.map(async (region) => ({
        region: region.code,
        name: region.name,
        color: rgbToHex(catalog.palette[region.code] ?? catalog.fallbackColor),
        series: valueOrEmpty(
          await repo.getSeries({ kind: 'region', code: region.code }, mode, range),
          [],
          logger,
          { kind: 'region', code: region.code, mode }
        ),
      }))
    );
    return fetched.filter((entry) => entry.series.length > 0);
  };

  const [pf, pj] = await Promise.all([forMode('pf'), forMode('pj')]);
  return { pf, pj };
}
