/**
 * CSV Report Formatter
 *
 * Export of the problematic entries, preceded by a commented summary.
 */

import type { AnalysisResult, Breakdown } from '../types/index.js';
import { problemRate } from '../report/aggregator.js';
import { FIELD_SEPARATOR, ISSUE_COLUMNS, issueRowCells, toIssueRows } from '../report/issue-rows.js';
import { formatGermanDateTime, formatPercent } from './utils.js';

export interface CsvReportOptions {
  /** Timestamp printed in the preamble */
  generatedAt: Date;
}

function pushBreakdown(lines: string[], title: string, breakdown: Breakdown): void {
  if (breakdown.length === 0) return;

  lines.push(`# ${title}:`);
  for (const { key, count } of breakdown) {
    lines.push(`# ${key}: ${count}`);
  }
  lines.push('#');
}

/**
 * Format an analysis result as CSV.
 *
 * Lines are joined with '\n' without a trailing newline. Field values are
 * not quoted; separators inside values were already replaced.
 */
export function formatCsvReport(result: AnalysisResult, options: CsvReportOptions): string {
  const lines: string[] = [];

  lines.push('# uberall Rechnungskontrolle - Bericht');
  lines.push(`# Erstellt am: ${formatGermanDateTime(options.generatedAt)}`);
  lines.push('#');
  lines.push(`# Gesamt verrechnet (gefiltert): ${result.totalBilled}`);
  lines.push(`# OK (korrekte Status-Kombination): ${result.okCount}`);
  lines.push(`# Manuelle Kontrolle nötig: ${result.issuesCount}`);
  if (result.totalBilled > 0) {
    lines.push(`# Problemrate: ${formatPercent(problemRate(result))}`);
  }
  lines.push('#');

  pushBreakdown(lines, 'Produkttyp-Breakdown', result.productBreakdown);
  pushBreakdown(lines, 'Location State-Breakdown', result.stateBreakdown);
  pushBreakdown(lines, 'Probleme nach Typ', result.issuesByType);

  lines.push('');
  lines.push(ISSUE_COLUMNS.map((column) => column.header).join(FIELD_SEPARATOR));

  for (const row of toIssueRows(result)) {
    lines.push(issueRowCells(row).join(FIELD_SEPARATOR));
  }

  return lines.join('\n');
}
