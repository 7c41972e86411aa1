/**
 * Load Latest Institution Table Use Case
 *
 * Finds the most recent quarter IF.Data has published, then merges the
 * registry with the summary and asset reports of that quarter:
 * 1. Probe candidate quarters, newest first, until the summary report has rows
 * 2. Fetch and filter the registry
 * 3. Fetch the asset report
 * 4. Build the wide table
 */

import { err, ok, type Result } from 'neverthrow';

import { valueOrEmpty } from '@/common/types/no-data.js';
import { emptyWideTable } from '@/common/types/wide-table.js';

import { buildWideTable, filterRegistry } from '../logic.js';
import { latestQuarterCandidates } from '../quarters.js';

import type { IfDataRepository } from '../ports.js';
import type { IfDataCatalog, InstitutionSnapshot } from '../types.js';
import type { MalformedInputError } from '@/common/types/errors.js';
import type { TabularResult } from '@/common/types/tabular.js';
import type { Logger } from 'pino';

export interface LoadLatestInstitutionTableDeps {
  repo: IfDataRepository;
  catalog: IfDataCatalog;
  logger: Logger;
  /** Clock used to pick candidate quarters */
  now?: () => Date;
}

export interface LoadLatestInstitutionTableInput {
  /** Number of quarters to probe; defaults to 6 */
  candidateCount?: number;
}

export async function loadLatestInstitutionTable(
  deps: LoadLatestInstitutionTableDeps,
  input: LoadLatestInstitutionTableInput = {}
): Promise<Result<InstitutionSnapshot, MalformedInputError>> {
  const { repo, catalog, logger } = deps;
  const today = (deps.now ?? (() => new Date()))();
  const candidates = latestQuarterCandidates(today, input.candidateCount ?? 6);

  let period: number | null = null;
  let summary: TabularResult = [];
  for (const candidate of candidates) {
    const report = valueOrEmpty(await repo.getReport(candidate, 'summary'), [], logger, {
      period: candidate,
      report: 'summary',
    });
    if (report.length > 0) {
      period = candidate;
      summary = report;
      break;
    }
  }

  if (period === null) {
    logger.warn({ candidates }, 'No IF.Data quarter with published values');
    return ok({ period: null, registrySize: 0, table: emptyWideTable() });
  }

  const registryTable = valueOrEmpty(await repo.getRegistry(period), [], logger, {
    period,
    report: 'registry',
  });

  const registryResult = filterRegistry(registryTable, catalog.registry);
  if (registryResult.isErr()) {
    return err(registryResult.error);
  }
  const registry = registryResult.value;

  if (registry.length === 0) {
    logger.warn({ period }, 'No registered institution matches the segment and name filter');
    return ok({ period, registrySize: 0, table: emptyWideTable() });
  }

  const assets = valueOrEmpty(await repo.getReport(period, 'assets'), [], logger, {
    period,
    report: 'assets',
  });

  return buildWideTable(
    registry,
    [
      { report: 'summary', table: summary },
      { report: 'assets', table: assets },
    ],
    {
      variables: catalog.variables,
      columns: catalog.valueColumns,
      displaySuffix: catalog.displaySuffix,
    }
  ).map((table) => {
    logger.debug(
      { period, institutions: table.rows.length, variables: table.variables },
      'Built institution table'
    );
    return { period, registrySize: registry.length, table };
  });
}
