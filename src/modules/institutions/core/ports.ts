/**
 * Institutions Module - Ports (Interfaces)
 */

import type { IfDataReport } from './types.js';
import type { FetchError } from '@/common/types/errors.js';
import type { TabularResult } from '@/common/types/tabular.js';
import type { Result } from 'neverthrow';

/**
 * Access to IF.Data. Periods are quarter ends as `YYYYMM`.
 */
export interface IfDataRepository {
  /**
   * Institution registry (IfDataCadastro): code, name and segment per institution.
   */
  getRegistry(period: number): Promise<Result<TabularResult, FetchError>>;

  /**
   * Report values (IfDataValores) for prudential conglomerates, in long format.
   */
  getReport(period: number, report: IfDataReport): Promise<Result<TabularResult, FetchError>>;
}
