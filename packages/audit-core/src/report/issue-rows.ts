/**
 * Issue Rows
 *
 * Flat, delimiter-safe rows for exporting the problematic entries.
 */

import type { AnalysisResult, IssueRow, ReconciliationOutcome } from '../types/index.js';

/** Field separator of the export */
export const FIELD_SEPARATOR = ',';

/** Substitute for separators inside field values */
export const SEPARATOR_SUBSTITUTE = ';';

/** Export columns in their fixed order */
export const ISSUE_COLUMNS: ReadonlyArray<{ header: string; field: keyof IssueRow }> = [
  { header: 'Location ID', field: 'locationId' },
  { header: 'Location Name', field: 'locationName' },
  { header: 'Location State', field: 'locationState' },
  { header: 'Problem Typ', field: 'problemType' },
  { header: 'Problem Detail', field: 'problemDetail' },
  { header: 'Workflow Status', field: 'workflowStatus' },
  { header: 'Projektname', field: 'projectName' },
];

/**
 * Replace separators so the value cannot split a row. No quoting is applied.
 */
export function sanitizeField(value: string): string {
  return value.split(FIELD_SEPARATOR).join(SEPARATOR_SUBSTITUTE);
}

function toIssueRow(outcome: ReconciliationOutcome): IssueRow {
  return {
    locationId: sanitizeField(outcome.billing.identifier),
    locationName: sanitizeField(outcome.billing.displayName),
    locationState: sanitizeField(outcome.billing.state),
    problemType: sanitizeField(outcome.verdict),
    problemDetail: sanitizeField(outcome.reason),
    workflowStatus: sanitizeField(outcome.workflowStatus),
    projectName: sanitizeField(outcome.projectName),
  };
}

/**
 * Export rows for every problematic entry, in billing order.
 */
export function toIssueRows(result: Pick<AnalysisResult, 'problematicEntries'>): IssueRow[] {
  return result.problematicEntries.map(toIssueRow);
}

/**
 * Cell values of a row in column order.
 */
export function issueRowCells(row: IssueRow): string[] {
  return ISSUE_COLUMNS.map(({ field }) => row[field]);
}
