/**
 * Reconciliation Engine Interface
 *
 * Interface for matching billing records to CRM records and classifying them.
 */

import type { BillingRecord, CrmRecord, ReconciliationRun } from '../types/index.js';

/**
 * Reconciliation Engine Interface
 *
 * Joins the two record sets by identifier and produces exactly one
 * outcome per billing record. Synchronous and free of I/O.
 */
export interface IReconciliationEngine {
  /**
   * Reconcile billing records against CRM records.
   *
   * @param billingRecords - Normalized billing records, in export order
   * @param crmRecords - Normalized CRM records, in export order
   * @returns Outcomes in billing order plus run statistics
   */
  reconcile(
    billingRecords: readonly BillingRecord[],
    crmRecords: readonly CrmRecord[]
  ): ReconciliationRun;
}
