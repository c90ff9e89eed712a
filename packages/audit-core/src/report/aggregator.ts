/**
 * Aggregator
 *
 * Reads the outcomes of a run once and builds the AnalysisResult.
 */

import type {
  AnalysisResult,
  Breakdown,
  ProblemType,
  ReconciliationOutcome,
  ReconciliationRun,
} from '../types/index.js';
import { PROBLEM_TYPES } from '../types/index.js';
import { AuditError } from '../errors/index.js';

/**
 * Counts values in order of first appearance
 */
class FrequencyCounter {
  private readonly counts = new Map<string, number>();

  add(key: string): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }

  toBreakdown(): Breakdown {
    return Array.from(this.counts, ([key, count]) => ({ key, count }));
  }
}

/**
 * Aggregate a reconciliation run.
 *
 * Product and state breakdowns cover every billing record of the run,
 * not only the problematic ones.
 */
export function aggregate(
  run: Pick<ReconciliationRun, 'outcomes' | 'duplicateCrmIdentifiers'>
): AnalysisResult {
  const products = new FrequencyCounter();
  const states = new FrequencyCounter();
  const issueTypes = new FrequencyCounter();
  const problematicEntries: ReconciliationOutcome[] = [];

  for (const outcome of run.outcomes) {
    products.add(outcome.billing.productCategory);
    states.add(outcome.billing.state);

    if (outcome.verdict !== 'OK') {
      issueTypes.add(outcome.verdict);
      problematicEntries.push(outcome);
    }
  }

  return {
    totalBilled: run.outcomes.length,
    okCount: run.outcomes.length - problematicEntries.length,
    issuesCount: problematicEntries.length,
    issuesByType: issueTypes.toBreakdown(),
    productBreakdown: products.toBreakdown(),
    stateBreakdown: states.toBreakdown(),
    problematicEntries,
    duplicateCrmIdentifiers: [...run.duplicateCrmIdentifiers],
  };
}

/**
 * Share of problematic entries in percent, 0 for an empty run.
 */
export function problemRate(result: Pick<AnalysisResult, 'totalBilled' | 'issuesCount'>): number {
  return result.totalBilled > 0 ? (result.issuesCount / result.totalBilled) * 100 : 0;
}

/** Filter value selecting every problem type */
export const ALL_PROBLEMS = 'Alle';

export type IssueFilter = ProblemType | typeof ALL_PROBLEMS;

/**
 * Problematic entries of one problem type, or all of them.
 */
export function filterIssues(result: AnalysisResult, filter: IssueFilter = ALL_PROBLEMS): ReconciliationOutcome[] {
  if (filter === ALL_PROBLEMS) {
    return [...result.problematicEntries];
  }
  return result.problematicEntries.filter((entry) => entry.verdict === filter);
}

const ISSUE_FILTERS: readonly IssueFilter[] = [ALL_PROBLEMS, ...Object.values(PROBLEM_TYPES)];

function isIssueFilter(value: string): value is IssueFilter {
  return ISSUE_FILTERS.some((filter) => filter === value);
}

/**
 * Parse a filter value given on the command line.
 */
export function parseIssueFilter(value: string): IssueFilter {
  const trimmed = value.trim();
  if (isIssueFilter(trimmed)) {
    return trimmed;
  }
  throw new AuditError({
    code: 'INVALID_OPTIONS',
    message: `Unknown problem type filter: "${value}"`,
    suggestion: `Use one of: ${ISSUE_FILTERS.join(', ')}`,
    context: { value },
  });
}
