/**
 * Reconciliation Types
 *
 * Outcomes of matching billing records against CRM records.
 */

import type { BillingRecord, CrmRecord } from './records.js';

/** Problem categories an outcome can fall into */
export const PROBLEM_TYPES = {
  notInCrm: 'Location nicht im CRM',
  statusMismatch: 'Status-Kombination Problem',
} as const;

export type ProblemType = (typeof PROBLEM_TYPES)[keyof typeof PROBLEM_TYPES];

export type Verdict = 'OK' | ProblemType;

/** Placeholder reported for CRM fields when no CRM record matched */
export const NOT_AVAILABLE = 'N/A';

/** Detail text for billing records without CRM counterpart */
export const NOT_IN_CRM_DETAIL = 'Location ID wurde im CRM nicht gefunden';

/**
 * Result of checking one billing record
 */
export interface ReconciliationOutcome {
  /** The billing record this outcome belongs to */
  readonly billing: BillingRecord;
  /** First CRM record with the same identifier, null if none */
  readonly crm: CrmRecord | null;
  readonly verdict: Verdict;
  /** 'OK', the rule's reason, or the not-in-CRM detail */
  readonly reason: string;
  /** Workflow status as reported, N/A without CRM match */
  readonly workflowStatus: string;
  /** Project name as reported, N/A without CRM match */
  readonly projectName: string;
}

/**
 * Identifier that occurs more than once in the CRM source
 */
export interface DuplicateIdentifier {
  identifier: string;
  /** Number of CRM records sharing the identifier */
  count: number;
}

/**
 * Everything one engine run produced
 */
export interface ReconciliationRun {
  /** One outcome per billing record, in billing order */
  outcomes: ReconciliationOutcome[];
  /** Number of CRM records indexed */
  crmRecordCount: number;
  /**
   * CRM identifiers referenced by billing records that have several CRM
   * records. The first one in source order was used for each.
   */
  duplicateCrmIdentifiers: DuplicateIdentifier[];
  /** Processing time in milliseconds */
  processingTimeMs: number;
}
