/**
 * JSON Report Formatter
 *
 * Machine-readable view of an analysis result.
 */

import type { AnalysisResult, Breakdown, DuplicateIdentifier, IssueRow } from '../types/index.js';
import { problemRate } from '../report/aggregator.js';
import { toIssueRows } from '../report/issue-rows.js';

export interface JsonReport {
  generatedAt: string;
  totalBilled: number;
  okCount: number;
  issuesCount: number;
  /** Percentage rounded to one decimal */
  problemRate: number;
  issuesByType: Breakdown;
  productBreakdown: Breakdown;
  stateBreakdown: Breakdown;
  duplicateCrmIdentifiers: DuplicateIdentifier[];
  issues: IssueRow[];
}

export function toJsonReport(result: AnalysisResult, generatedAt: Date): JsonReport {
  return {
    generatedAt: generatedAt.toISOString(),
    totalBilled: result.totalBilled,
    okCount: result.okCount,
    issuesCount: result.issuesCount,
    problemRate: Math.round(problemRate(result) * 10) / 10,
    issuesByType: result.issuesByType,
    productBreakdown: result.productBreakdown,
    stateBreakdown: result.stateBreakdown,
    duplicateCrmIdentifiers: result.duplicateCrmIdentifiers,
    issues: toIssueRows(result),
  };
}

export function formatJsonReport(result: AnalysisResult, generatedAt: Date): string {
  return JSON.stringify(toJsonReport(result, generatedAt), null, 2);
}
