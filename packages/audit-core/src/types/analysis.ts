/**
 * Analysis Types
 *
 * Aggregated view of a reconciliation run, consumed by the formatters.
 */

import type { DuplicateIdentifier, ReconciliationOutcome } from './reconciliation.js';

/** One line of a frequency breakdown */
export interface BreakdownEntry {
  key: string;
  count: number;
}

/** Frequency counts in order of first appearance */
export type Breakdown = BreakdownEntry[];

/**
 * Summary of a reconciliation run
 */
export interface AnalysisResult {
  /** Billing records that reached the engine */
  totalBilled: number;
  okCount: number;
  issuesCount: number;
  /** Issue count per problem type */
  issuesByType: Breakdown;
  /** Billing records per product category */
  productBreakdown: Breakdown;
  /** Billing records per billing state */
  stateBreakdown: Breakdown;
  /** Non-OK outcomes in billing order */
  problematicEntries: ReconciliationOutcome[];
  duplicateCrmIdentifiers: DuplicateIdentifier[];
}

/**
 * Flat export row for one problematic entry
 */
export interface IssueRow {
  locationId: string;
  locationName: string;
  locationState: string;
  problemType: string;
  problemDetail: string;
  workflowStatus: string;
  projectName: string;
}
