/**
 * Reconciliation Engine
 *
 * Matches billing records to CRM records by identifier and classifies
 * each pair with the status compatibility rule.
 */

import type { IReconciliationEngine } from '../interfaces/index.js';
import type {
  BillingRecord,
  CrmRecord,
  DuplicateIdentifier,
  ReconciliationOutcome,
  ReconciliationRun,
} from '../types/index.js';
import { NOT_AVAILABLE, NOT_IN_CRM_DETAIL, PROBLEM_TYPES } from '../types/index.js';
import { AuditError } from '../errors/index.js';
import { StatusCompatibilityRule } from '../rules/index.js';
import { CrmIndex } from './crm-index.js';

/**
 * Reconciliation Engine Implementation
 *
 * Builds an identifier index over the CRM records once per run, then walks
 * the billing records in order. When several CRM records share an
 * identifier the first one in source order is used.
 */
export class ReconciliationEngine implements IReconciliationEngine {
  private readonly rule: StatusCompatibilityRule;

  constructor(rule: StatusCompatibilityRule = new StatusCompatibilityRule()) {
    this.rule = rule;
  }

  reconcile(
    billingRecords: readonly BillingRecord[],
    crmRecords: readonly CrmRecord[]
  ): ReconciliationRun {
    const startTime = Date.now();

    this.validateBillingRecords(billingRecords);

    const index = new CrmIndex(crmRecords);
    const outcomes = billingRecords.map((billing) =>
      this.classify(billing, index.first(billing.identifier))
    );

    return {
      outcomes,
      crmRecordCount: crmRecords.length,
      duplicateCrmIdentifiers: this.findDuplicates(billingRecords, index),
      processingTimeMs: Date.now() - startTime,
    };
  }

  /**
   * Build the outcome for one billing record.
   */
  private classify(billing: BillingRecord, crm: CrmRecord | null): ReconciliationOutcome {
    if (!crm) {
      return {
        billing,
        crm: null,
        verdict: PROBLEM_TYPES.notInCrm,
        reason: NOT_IN_CRM_DETAIL,
        workflowStatus: NOT_AVAILABLE,
        projectName: NOT_AVAILABLE,
      };
    }

    const verdict = this.rule.evaluate(billing.state, crm.workflowStatus);

    return {
      billing,
      crm,
      verdict: verdict.compatible ? 'OK' : PROBLEM_TYPES.statusMismatch,
      reason: verdict.reason,
      workflowStatus: crm.workflowStatus,
      projectName: crm.projectName,
    };
  }

  /**
   * CRM identifiers used by billing records that resolve to several CRM
   * records, in order of first billing reference.
   */
  private findDuplicates(
    billingRecords: readonly BillingRecord[],
    index: CrmIndex
  ): DuplicateIdentifier[] {
    const seen = new Set<string>();
    const duplicates: DuplicateIdentifier[] = [];

    for (const { identifier } of billingRecords) {
      if (seen.has(identifier)) continue;
      seen.add(identifier);

      const count = index.count(identifier);
      if (count > 1) {
        duplicates.push({ identifier, count });
      }
    }

    return duplicates;
  }

  /**
   * Empty identifiers are filtered by the normalizer; seeing one here means
   * the caller skipped normalization.
   */
  private validateBillingRecords(billingRecords: readonly BillingRecord[]): void {
    billingRecords.forEach((record, position) => {
      if (record.identifier.trim() === '') {
        throw new AuditError({
          code: 'INVALID_INPUT',
          message: `Billing record at position ${position} has an empty identifier`,
          suggestion: 'Pass billing rows through RecordNormalizer before reconciling.',
          context: { position, displayName: record.displayName },
        });
      }
    });
  }
}
