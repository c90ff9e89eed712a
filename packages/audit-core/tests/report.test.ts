import { describe, expect, it } from 'vitest';
import type { AnalysisResult, BillingRecord, CrmRecord } from '../src/index.js';
import {
  AuditError,
  COMPLETION_PHRASE,
  aggregate,
  categorizeProduct,
  createReconciliationEngine,
  filterIssues,
  formatCsvReport,
  formatSummary,
  formatGermanDateTime,
  parseIssueFilter,
  problemRate,
  reportFileName,
  sanitizeField,
  toIssueRows,
  toJsonReport,
} from '../src/index.js';

function billing(
  identifier: string,
  displayName: string,
  state: string,
  planName: string
): BillingRecord {
  return {
    identifier,
    salesPartner: 'Edelweiss Digital GmbH',
    state,
    displayName,
    planName,
    productCategory: categorizeProduct(planName),
  };
}

function crm(identifier: string, workflowStatus: string, projectName: string): CrmRecord {
  return { identifier, workflowStatus, projectName };
}

function analyze(billingRecords: BillingRecord[], crmRecords: CrmRecord[]): AnalysisResult {
  return aggregate(createReconciliationEngine().reconcile(billingRecords, crmRecords));
}

const generatedAt = new Date(2025, 6, 27, 9, 5);

const sample = analyze(
  [
    billing('L1', 'Alpha', 'ACTIVE', 'Basic'),
    billing('L2', 'Beta', 'CANCELLED', 'Pro'),
    billing('L3', 'Gamma, Wien', 'ACTIVE', 'Basic Plus'),
  ],
  [
    crm('L1', COMPLETION_PHRASE, 'P1'),
    crm('L2', 'abgeschlossen', 'P2, Teil 1'),
  ]
);

describe('aggregate', () => {
  it('counts outcomes and keeps first-appearance order', () => {
    expect(sample.totalBilled).toBe(3);
    expect(sample.okCount).toBe(1);
    expect(sample.issuesCount).toBe(2);
    expect(sample.productBreakdown).toEqual([
      { key: 'Firmendaten Manager Basic', count: 2 },
      { key: 'Firmendaten Manager PRO', count: 1 },
    ]);
    expect(sample.stateBreakdown).toEqual([
      { key: 'ACTIVE', count: 2 },
      { key: 'CANCELLED', count: 1 },
    ]);
    expect(sample.issuesByType).toEqual([
      { key: 'Status-Kombination Problem', count: 1 },
      { key: 'Location nicht im CRM', count: 1 },
    ]);
    expect(sample.problematicEntries.map((e) => e.billing.identifier)).toEqual(['L2', 'L3']);
  });

  it('computes the problem rate', () => {
    expect(problemRate(sample)).toBeCloseTo(66.667, 2);
    expect(problemRate({ totalBilled: 0, issuesCount: 0 })).toBe(0);
  });
});

describe('issue rows', () => {
  it('replaces separators in every field', () => {
    expect(sanitizeField('a,b,c')).toBe('a;b;c');
    expect(toIssueRows(sample)).toEqual([
      {
        locationId: 'L2',
        locationName: 'Beta',
        locationState: 'CANCELLED',
        problemType: 'Status-Kombination Problem',
        problemDetail: 'CANCELLED aber nicht gekündigt im Workflow-Status',
        workflowStatus: 'abgeschlossen',
        projectName: 'P2; Teil 1',
      },
      {
        locationId: 'L3',
        locationName: 'Gamma; Wien',
        locationState: 'ACTIVE',
        problemType: 'Location nicht im CRM',
        problemDetail: 'Location ID wurde im CRM nicht gefunden',
        workflowStatus: 'N/A',
        projectName: 'N/A',
      },
    ]);
  });
});

describe('filters', () => {
  it('selects one problem type or all', () => {
    expect(filterIssues(sample, 'Alle')).toHaveLength(2);
    expect(filterIssues(sample, 'Location nicht im CRM').map((e) => e.billing.identifier)).toEqual([
      'L3',
    ]);
  });

  it('returns a copy that callers can change', () => {
    const selected = filterIssues(sample);
    selected.pop();

    expect(selected).toHaveLength(1);
    expect(sample.problematicEntries).toHaveLength(2);
    expect(sample.issuesCount).toBe(2);
  });

  it('parses filter values', () => {
    expect(parseIssueFilter('Alle')).toBe('Alle');
    expect(parseIssueFilter(' Status-Kombination Problem ')).toBe('Status-Kombination Problem');
    expect(() => parseIssueFilter('Sonstiges')).toThrow(AuditError);
  });
});

describe('formatCsvReport', () => {
  it('writes the preamble and the issue rows', () => {
    expect(formatCsvReport(sample, { generatedAt }).split('\n')).toEqual([
      '# uberall Rechnungskontrolle - Bericht',
      '# Erstellt am: 27.07.2025 09:05',
      '#',
      '# Gesamt verrechnet (gefiltert): 3',
      '# OK (korrekte Status-Kombination): 1',
      '# Manuelle Kontrolle nötig: 2',
      '# Problemrate: 66.7%',
      '#',
      '# Produkttyp-Breakdown:',
      '# Firmendaten Manager Basic: 2',
      '# Firmendaten Manager PRO: 1',
      '#',
      '# Location State-Breakdown:',
      '# ACTIVE: 2',
      '# CANCELLED: 1',
      '#',
      '# Probleme nach Typ:',
      '# Status-Kombination Problem: 1',
      '# Location nicht im CRM: 1',
      '#',
      '',
      'Location ID,Location Name,Location State,Problem Typ,Problem Detail,Workflow Status,Projektname',
      'L2,Beta,CANCELLED,Status-Kombination Problem,CANCELLED aber nicht gekündigt im Workflow-Status,abgeschlossen,P2; Teil 1',
      'L3,Gamma; Wien,ACTIVE,Location nicht im CRM,Location ID wurde im CRM nicht gefunden,N/A,N/A',
    ]);
  });

  it('omits the rate and empty blocks for an empty run', () => {
    const empty = analyze([], []);

    expect(formatCsvReport(empty, { generatedAt })).toBe(
      [
        '# uberall Rechnungskontrolle - Bericht',
        '# Erstellt am: 27.07.2025 09:05',
        '#',
        '# Gesamt verrechnet (gefiltert): 0',
        '# OK (korrekte Status-Kombination): 0',
        '# Manuelle Kontrolle nötig: 0',
        '#',
        '',
        'Location ID,Location Name,Location State,Problem Typ,Problem Detail,Workflow Status,Projektname',
      ].join('\n')
    );
  });
});

describe('formatSummary', () => {
  it('lists the filtered entries with dashboard links', () => {
    const lines = formatSummary(sample, { filter: 'Status-Kombination Problem' }).split('\n');

    expect(lines).toContain('- Problemrate: 66.7%');
    expect(lines).toContain('### Problematische Einträge (Filter: Status-Kombination Problem)');
    expect(lines).toContain('**L2** Beta (CANCELLED)');
    expect(lines).toContain('- Dashboard: https://app.uberall.com/locations/L2');
    expect(lines).not.toContain('**L3** Gamma, Wien (ACTIVE)');
    expect(lines[lines.length - 1]).toBe('Zeige 1 von 2 problematischen Einträgen');
  });

  it('reports when everything is correct', () => {
    const clean = analyze(
      [billing('L1', 'Alpha', 'ACTIVE', 'Basic')],
      [crm('L1', COMPLETION_PHRASE, 'P1')]
    );
    const lines = formatSummary(clean).split('\n');

    expect(lines).toContain('- Problemrate: 0.0%');
    expect(lines[lines.length - 1]).toBe(
      'Alle Einträge sind korrekt! Keine manuellen Kontrollen nötig.'
    );
  });

  it('reports an empty filter selection', () => {
    const onlyMissing = analyze([billing('L5', 'Epsilon', 'ACTIVE', 'Pro')], []);
    const lines = formatSummary(onlyMissing, { filter: 'Status-Kombination Problem' }).split('\n');

    expect(lines).toContain('- Problemrate: 100.0%');
    expect(lines[lines.length - 1]).toBe('Keine Einträge für den gewählten Filter.');
  });

  it('shows 0% for an empty run and lists duplicate CRM identifiers', () => {
    expect(formatSummary(analyze([], [])).split('\n')).toContain('- Problemrate: 0%');

    const duplicated = analyze(
      [billing('L9', 'Neun', 'CANCELLED', 'Plus')],
      [crm('L9', 'gekündigt', 'A'), crm('L9', 'offen', 'B')]
    );
    expect(formatSummary(duplicated).split('\n')).toContain(
      '- L9: 2 Projekte, das erste wurde verwendet'
    );
  });
});

describe('toJsonReport', () => {
  it('rounds the rate and includes the issue rows', () => {
    const report = toJsonReport(sample, generatedAt);

    expect(report.problemRate).toBe(66.7);
    expect(report.generatedAt).toBe(generatedAt.toISOString());
    expect(report.issues.map((row) => row.locationId)).toEqual(['L2', 'L3']);
  });
});

describe('date formatting', () => {
  it('formats local dates', () => {
    expect(formatGermanDateTime(new Date(2025, 0, 5, 7, 3))).toBe('05.01.2025 07:03');
    expect(reportFileName(new Date(2025, 0, 5, 7, 3))).toBe('uberall_kontrolle_20250105_0703.csv');
  });
});
