/**
 * Download Institution History Use Case
 *
 * Raw report rows for a range of quarters, restricted to the institutions
 * registered at the end of the range. Each row is tagged with its period,
 * its report name and the institution name.
 */

import { err, ok, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';
import { requireColumns, toText, type Row } from '@/common/types/tabular.js';

import { filterRegistry } from '../logic.js';
import { quarterRange } from '../quarters.js';
import { IFDATA_REPORTS, type IfDataCatalog, type IfDataReport } from '../types.js';

import type { InvalidQuarterRangeError } from '../errors.js';
import type { IfDataRepository } from '../ports.js';
import type { MalformedInputError } from '@/common/types/errors.js';
import type { Logger } from 'pino';

export interface DownloadInstitutionHistoryDeps {
  repo: IfDataRepository;
  catalog: IfDataCatalog;
  logger: Logger;
}

export interface DownloadInstitutionHistoryInput {
  /** First quarter end, `YYYYMM` */
  start: number;
  /** Last quarter end, `YYYYMM` */
  end: number;
}

export interface InstitutionHistory {
  readonly periods: readonly number[];
  readonly rows: readonly Row[];
}

const REPORT_ORDER: readonly IfDataReport[] = ['summary', 'assets'];

export async function downloadInstitutionHistory(
  deps: DownloadInstitutionHistoryDeps,
  input: DownloadInstitutionHistoryInput
): Promise<Result<InstitutionHistory, InvalidQuarterRangeError | MalformedInputError>> {
  const { repo, catalog, logger } = deps;

  const periodsResult = quarterRange(input.start, input.end);
  if (periodsResult.isErr()) {
    return err(periodsResult.error);
  }
  const periods = periodsResult.value;

  const registryTable = valueOrEmpty(await repo.getRegistry(input.end), [], logger, {
    period: input.end,
    report: 'registry',
  });
  const registryResult = filterRegistry(registryTable, catalog.registry);
  if (registryResult.isErr()) {
    return err(registryResult.error);
  }

  const names = new Map<string, string>();
  for (const entry of registryResult.value) {
    names.set(entry.entityId, entry.name);
  }

  const idColumn = catalog.valueColumns.entityId;
  const nameColumn = catalog.registry.columns.name;
  const rows: Row[] = [];

  for (const period of periods) {
    for (const report of REPORT_ORDER) {
      const table = valueOrEmpty(await repo.getReport(period, report), [], logger, {
        period,
        report,
      });

      const check = requireColumns(table, [idColumn], `value table '${report}'`);
      if (check.isErr()) {
        return err(check.error);
      }

      for (const row of table) {
        const entityId = toText(row[idColumn]);
        const name = entityId === null ? undefined : names.get(entityId);
        if (name === undefined) continue;

        rows.push({
          ...row,
          AnoMes: period,
          Relatorio: IFDATA_REPORTS[report].name,
          [nameColumn]: name,
        });
      }
    }
  }

  logger.debug({ periods, rows: rows.length }, 'Collected institution history');
  return ok({ periods, rows });
}
