/**
 * Audit Run
 *
 * Loads both exports, reconciles them and writes the CSV report.
 */

import {
  aggregate,
  createReconciliationEngine,
  type AnalysisResult,
  type BillingRecord,
  type CrmRecord,
} from '@billing-audit/audit-core';
import type { AuditSettings } from './config.js';
import type { Logger } from './logger.js';
import { loadBillingSource, loadCrmSource, type LoadResult } from './source-loader.js';
import { writeReport } from './report-writer.js';

export interface AuditRunResult {
  result: AnalysisResult;
  billing: LoadResult<BillingRecord>;
  crm: LoadResult<CrmRecord>;
  /** Path of the written CSV report, null when no output directory is set */
  reportPath: string | null;
}

export async function runAudit(
  settings: AuditSettings,
  logger: Logger,
  now: Date = new Date()
): Promise<AuditRunResult> {
  const billing = await loadBillingSource(
    {
      filePath: settings.billing.filePath,
      sheet: settings.billing.sheet,
      salesPartners: settings.salesPartners,
      columns: settings.columns,
    },
    logger
  );

  const crm = await loadCrmSource(
    {
      filePath: settings.crm.filePath,
      encoding: settings.crm.encoding,
      delimiters: settings.crm.delimiters,
      columns: settings.columns,
    },
    logger
  );

  const run = createReconciliationEngine().reconcile(billing.records, crm.records);
  const result = aggregate(run);

  logger.info('Reconciliation finished', {
    billed: result.totalBilled,
    ok: result.okCount,
    issues: result.issuesCount,
    durationMs: run.processingTimeMs,
  });

  for (const { identifier, count } of run.duplicateCrmIdentifiers) {
    logger.warn('Location id occurs several times in the CRM export, using the first project', {
      identifier,
      count,
    });
  }

  let reportPath: string | null = null;
  if (settings.report.outDir) {
    reportPath = await writeReport(result, { outDir: settings.report.outDir, now });
    logger.info('Report written', { path: reportPath });
  }

  return { result, billing, crm, reportPath };
}
