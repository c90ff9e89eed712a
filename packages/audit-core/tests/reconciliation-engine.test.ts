import { describe, expect, it } from 'vitest';
import type { BillingRecord, CrmRecord } from '../src/index.js';
import {
  AuditError,
  COMPLETION_PHRASE,
  CrmIndex,
  ReconciliationEngine,
  aggregate,
  categorizeProduct,
  createReconciliationEngine,
} from '../src/index.js';

function billing(identifier: string, state: string, planName: string | null = null): BillingRecord {
  return {
    identifier,
    salesPartner: 'Edelweiss Digital GmbH',
    state,
    displayName: `Location ${identifier}`,
    planName,
    productCategory: categorizeProduct(planName),
  };
}

function crm(identifier: string, workflowStatus: string, projectName: string): CrmRecord {
  return { identifier, workflowStatus, projectName };
}

describe('CrmIndex', () => {
  it('keeps source order under one identifier', () => {
    const index = new CrmIndex([crm('L9', 'a', 'P1'), crm('L1', 'b', 'P2'), crm('L9', 'c', 'P3')]);

    expect(index.size).toBe(2);
    expect(index.count('L9')).toBe(2);
    expect(index.first('L9')?.projectName).toBe('P1');
    expect(index.first('missing')).toBeNull();
  });
});

describe('ReconciliationEngine', () => {
  const engine = createReconciliationEngine();

  it('reports billing records without CRM record', () => {
    const run = engine.reconcile([billing('L123', 'ACTIVE')], [crm('L999', COMPLETION_PHRASE, 'P')]);

    expect(run.outcomes).toHaveLength(1);
    expect(run.outcomes[0]).toMatchObject({
      crm: null,
      verdict: 'Location nicht im CRM',
      reason: 'Location ID wurde im CRM nicht gefunden',
      workflowStatus: 'N/A',
      projectName: 'N/A',
    });
  });

  it('uses the first CRM record for duplicate identifiers', () => {
    const billingRecords = [billing('L9', 'CANCELLED')];
    const crmRecords = [
      crm('L9', 'Vertrag gekündigt', 'Erstes Projekt'),
      crm('L9', COMPLETION_PHRASE, 'Zweites Projekt'),
    ];

    const first = engine.reconcile(billingRecords, crmRecords);
    const second = engine.reconcile(billingRecords, crmRecords);

    for (const run of [first, second]) {
      expect(run.outcomes[0]?.verdict).toBe('OK');
      expect(run.outcomes[0]?.projectName).toBe('Erstes Projekt');
      expect(run.duplicateCrmIdentifiers).toEqual([{ identifier: 'L9', count: 2 }]);
    }
  });

  it('only lists duplicates referenced by billing records', () => {
    const run = engine.reconcile(
      [billing('L1', 'ACTIVE'), billing('L1', 'ACTIVE')],
      [crm('L1', COMPLETION_PHRASE, 'P1'), crm('L2', 'x', 'A'), crm('L2', 'y', 'B')]
    );

    expect(run.duplicateCrmIdentifiers).toEqual([]);
    expect(run.crmRecordCount).toBe(3);
  });

  it('matches identifiers case-sensitively', () => {
    const run = engine.reconcile([billing('l9', 'ACTIVE')], [crm('L9', COMPLETION_PHRASE, 'P')]);
    expect(run.outcomes[0]?.verdict).toBe('Location nicht im CRM');
  });

  it('classifies status mismatches with the rule reason', () => {
    const run = engine.reconcile(
      [billing('L1', 'ACTIVE')],
      [crm('L1', 'STORNO wegen Doppelbuchung', 'P1')]
    );

    expect(run.outcomes[0]).toMatchObject({
      verdict: 'Status-Kombination Problem',
      reason: 'STORNO-Status sollte nicht verrechnet werden',
      workflowStatus: 'STORNO wegen Doppelbuchung',
      projectName: 'P1',
    });
  });

  it('keeps billing order and the count invariant', () => {
    const billingRecords = [
      billing('L3', 'ACTIVE'),
      billing('L1', 'CANCELLED'),
      billing('L2', 'INACTIVE'),
      billing('L4', 'ACTIVE'),
    ];
    const crmRecords = [
      crm('L1', 'gekündigt', 'P1'),
      crm('L2', '', 'P2'),
      crm('L3', COMPLETION_PHRASE, 'P3'),
    ];

    const run = engine.reconcile(billingRecords, crmRecords);
    const result = aggregate(run);

    expect(run.outcomes.map((o) => o.billing.identifier)).toEqual(['L3', 'L1', 'L2', 'L4']);
    expect(result.okCount + result.issuesCount).toBe(result.totalBilled);
    expect(result.okCount).toBe(2);
    expect(result.issuesCount).toBe(2);
  });

  it('rejects records that were not normalized', () => {
    const reconcile = () =>
      new ReconciliationEngine().reconcile([billing('L1', 'ACTIVE'), billing(' ', 'ACTIVE')], []);

    expect(reconcile).toThrow(AuditError);
    try {
      reconcile();
    } catch (error) {
      expect(error).toBeInstanceOf(AuditError);
      if (error instanceof AuditError) {
        expect(error.code).toBe('INVALID_INPUT');
        expect(error.context).toEqual({ position: 1, displayName: 'Location  ' });
      }
    }
  });

  it('handles empty input', () => {
    const run = engine.reconcile([], []);
    expect(run.outcomes).toEqual([]);
    expect(run.duplicateCrmIdentifiers).toEqual([]);
  });
});
