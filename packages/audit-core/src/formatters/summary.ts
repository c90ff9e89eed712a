/**
 * Summary Formatter
 *
 * Terminal view of an analysis result.
 */

import type { AnalysisResult, Breakdown } from '../types/index.js';
import { NOT_AVAILABLE } from '../types/index.js';
import { ALL_PROBLEMS, filterIssues, problemRate, type IssueFilter } from '../report/aggregator.js';
import { formatGermanDateTime, formatPercent } from './utils.js';

/** Dashboard page of a location, the identifier is appended */
export const DEFAULT_DASHBOARD_URL = 'https://app.uberall.com/locations/';

export interface SummaryOptions {
  /** Problem type to list, default all */
  filter?: IssueFilter;
  dashboardUrl?: string;
  generatedAt?: Date;
}

function pushBreakdown(lines: string[], title: string, breakdown: Breakdown): void {
  if (breakdown.length === 0) return;

  lines.push(`### ${title}`);
  for (const { key, count } of breakdown) {
    lines.push(`- ${key}: ${count}`);
  }
  lines.push('');
}

function dashboardLink(identifier: string, baseUrl: string): string {
  if (!identifier || identifier === NOT_AVAILABLE) {
    return NOT_AVAILABLE;
  }
  return `${baseUrl}${encodeURIComponent(identifier)}`;
}

/**
 * Format an analysis result as plain text
 */
export function formatSummary(result: AnalysisResult, options: SummaryOptions = {}): string {
  const filter = options.filter ?? ALL_PROBLEMS;
  const baseUrl = options.dashboardUrl ?? DEFAULT_DASHBOARD_URL;
  const lines: string[] = [];

  lines.push('## uberall Rechnungskontrolle');
  if (options.generatedAt) {
    lines.push(`Erstellt am: ${formatGermanDateTime(options.generatedAt)}`);
  }
  lines.push('');

  lines.push('### Übersicht');
  lines.push(`- Gesamt verrechnet: ${result.totalBilled}`);
  lines.push(`- OK (korrekt): ${result.okCount}`);
  lines.push(`- Manuelle Kontrolle: ${result.issuesCount}`);
  lines.push(`- Problemrate: ${result.totalBilled > 0 ? formatPercent(problemRate(result)) : '0%'}`);
  lines.push('');

  pushBreakdown(lines, 'Produkttyp-Breakdown', result.productBreakdown);
  pushBreakdown(lines, 'Location State-Breakdown', result.stateBreakdown);

  if (result.duplicateCrmIdentifiers.length > 0) {
    lines.push('### Mehrfach im CRM');
    for (const { identifier, count } of result.duplicateCrmIdentifiers) {
      lines.push(`- ${identifier}: ${count} Projekte, das erste wurde verwendet`);
    }
    lines.push('');
  }

  if (result.problematicEntries.length === 0) {
    lines.push('Alle Einträge sind korrekt! Keine manuellen Kontrollen nötig.');
    return lines.join('\n');
  }

  lines.push(`### Problematische Einträge (Filter: ${filter})`);
  const entries = filterIssues(result, filter);

  if (entries.length === 0) {
    lines.push('Keine Einträge für den gewählten Filter.');
    return lines.join('\n');
  }

  for (const entry of entries) {
    const { billing } = entry;
    lines.push('');
    lines.push(`**${billing.identifier}** ${billing.displayName} (${billing.state})`);
    lines.push(`- Problem: ${entry.reason}`);
    lines.push(`- Workflow Status: ${entry.workflowStatus}`);
    lines.push(`- Projektname: ${entry.projectName}`);
    lines.push(`- Dashboard: ${dashboardLink(billing.identifier, baseUrl)}`);
  }

  lines.push('');
  lines.push(`Zeige ${entries.length} von ${result.problematicEntries.length} problematischen Einträgen`);

  return lines.join('\n');
}
