/**
 * RecordNormalizer
 *
 * Turns raw source rows into typed, frozen records. Rows whose identifier
 * is empty after trimming are dropped (null) before they reach the engine.
 */

import type { Row } from '@billing-audit/core';
import type { BillingRecord, CrmRecord } from '../types/index.js';
import { DEFAULT_COLUMNS, type ColumnMapping } from './columns.js';
import { billingFieldsSchema, crmFieldsSchema } from './row-schemas.js';
import { categorizeProduct } from './product-category.js';

export class RecordNormalizer {
  constructor(private readonly columns: ColumnMapping = DEFAULT_COLUMNS) {}

  /**
   * Normalize a billing row; null when it has no identifier.
   */
  normalizeBilling(row: Row): BillingRecord | null {
    const c = this.columns.billing;
    const fields = billingFieldsSchema.parse({
      identifier: row[c.identifier],
      salesPartner: row[c.salesPartner],
      state: row[c.state],
      displayName: row[c.displayName],
      planName: row[c.plan],
    });

    if (fields.identifier === '') {
      return null;
    }

    return Object.freeze({
      ...fields,
      productCategory: categorizeProduct(fields.planName),
    });
  }

  /**
   * Normalize a CRM row; null when it has no identifier.
   */
  normalizeCrm(row: Row): CrmRecord | null {
    const c = this.columns.crm;
    const fields = crmFieldsSchema.parse({
      identifier: row[c.identifier],
      workflowStatus: row[c.workflowStatus],
      projectName: row[c.projectName],
    });

    if (fields.identifier === '') {
      return null;
    }

    return Object.freeze(fields);
  }

  /**
   * Normalize many billing rows, keeping order.
   */
  normalizeBillingRows(rows: readonly Row[]): { records: BillingRecord[]; dropped: number } {
    return this.collect(rows, (row) => this.normalizeBilling(row));
  }

  /**
   * Normalize many CRM rows, keeping order.
   */
  normalizeCrmRows(rows: readonly Row[]): { records: CrmRecord[]; dropped: number } {
    return this.collect(rows, (row) => this.normalizeCrm(row));
  }

  private collect<T>(
    rows: readonly Row[],
    normalize: (row: Row) => T | null
  ): { records: T[]; dropped: number } {
    const records: T[] = [];
    let dropped = 0;
    for (const row of rows) {
      const record = normalize(row);
      if (record === null) {
        dropped++;
      } else {
        records.push(record);
      }
    }
    return { records, dropped };
  }
}
