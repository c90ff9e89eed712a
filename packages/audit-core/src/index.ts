/**
 * @billing-audit/audit-core
 *
 * Billing against CRM reconciliation for billed locations.
 * Normalizes source rows, checks each billing state against the CRM
 * workflow status and aggregates the findings into reports.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Normalizer Module
import { RecordNormalizer as _RecordNormalizer } from './normalizer/index.js';
import type { ColumnOverrides } from './normalizer/index.js';
import { resolveColumns } from './normalizer/index.js';
export {
  RecordNormalizer,
  categorizeProduct,
  cellText,
  cellTextSchema,
  optionalCellTextSchema,
  billingFieldsSchema,
  crmFieldsSchema,
  DEFAULT_COLUMNS,
  resolveColumns,
  requiredBillingColumns,
  requiredCrmColumns,
} from './normalizer/index.js';
export type {
  BillingFields,
  CrmFields,
  BillingColumns,
  CrmColumns,
  ColumnMapping,
  ColumnOverrides,
} from './normalizer/index.js';

// Rules Module
export {
  StatusCompatibilityRule,
  evaluateStatus,
  STATUS_REASONS,
  COMPLETION_PHRASE,
  CANCELLATION_MARKER,
  VOID_MARKER,
} from './rules/index.js';
export type { StatusVerdict } from './rules/index.js';

// Reconciliation Module
import { ReconciliationEngine as _ReconciliationEngine } from './reconciliation/index.js';
export { ReconciliationEngine, CrmIndex } from './reconciliation/index.js';

// Report Module
export {
  aggregate,
  problemRate,
  filterIssues,
  parseIssueFilter,
  ALL_PROBLEMS,
  toIssueRows,
  issueRowCells,
  sanitizeField,
  ISSUE_COLUMNS,
  FIELD_SEPARATOR,
  SEPARATOR_SUBSTITUTE,
} from './report/index.js';
export type { IssueFilter } from './report/index.js';

// Formatters
export {
  formatCsvReport,
  formatSummary,
  formatJsonReport,
  toJsonReport,
  formatGermanDateTime,
  formatPercent,
  reportFileName,
  DEFAULT_DASHBOARD_URL,
} from './formatters/index.js';
export type { CsvReportOptions, SummaryOptions, JsonReport } from './formatters/index.js';

// Errors
export { AuditError } from './errors/index.js';
export type { AuditErrorCode, AuditErrorDetails } from './errors/index.js';

/**
 * Factory function to create a ReconciliationEngine with the default rule
 */
export function createReconciliationEngine(): _ReconciliationEngine {
  return new _ReconciliationEngine();
}

/**
 * Factory function to create a RecordNormalizer
 *
 * @param overrides - Column names that differ from the default exports
 */
export function createRecordNormalizer(overrides?: ColumnOverrides): _RecordNormalizer {
  return new _RecordNormalizer(resolveColumns(overrides));
}
