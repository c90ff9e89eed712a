/**
 * Type exports for audit-core
 */

export type { ProductCategory, BillingRecord, CrmRecord } from './records.js';

export { PROBLEM_TYPES, NOT_AVAILABLE, NOT_IN_CRM_DETAIL } from './reconciliation.js';
export type {
  ProblemType,
  Verdict,
  ReconciliationOutcome,
  DuplicateIdentifier,
  ReconciliationRun,
} from './reconciliation.js';

export type { BreakdownEntry, Breakdown, AnalysisResult, IssueRow } from './analysis.js';
