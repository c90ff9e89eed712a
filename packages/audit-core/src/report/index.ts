/**
 * Report Module Exports
 */

export {
  aggregate,
  problemRate,
  filterIssues,
  parseIssueFilter,
  ALL_PROBLEMS,
} from './aggregator.js';
export type { IssueFilter } from './aggregator.js';
export {
  toIssueRows,
  issueRowCells,
  sanitizeField,
  ISSUE_COLUMNS,
  FIELD_SEPARATOR,
  SEPARATOR_SUBSTITUTE,
} from './issue-rows.js';
