/**
 * CrmIndex
 *
 * Identifier -> CRM records, built once per run. Records under one
 * identifier keep source order, so `first()` is the first one in the export.
 */

import type { CrmRecord } from '../types/index.js';

export class CrmIndex {
  private readonly buckets = new Map<string, CrmRecord[]>();

  constructor(records: readonly CrmRecord[]) {
    for (const record of records) {
      const bucket = this.buckets.get(record.identifier);
      if (bucket) bucket.push(record);
      else this.buckets.set(record.identifier, [record]);
    }
  }

  /** Number of distinct identifiers */
  get size(): number {
    return this.buckets.size;
  }

  /**
   * First CRM record with exactly this identifier (case-sensitive), or null.
   */
  first(identifier: string): CrmRecord | null {
    return this.buckets.get(identifier)?.[0] ?? null;
  }

  /**
   * Number of CRM records with this identifier.
   */
  count(identifier: string): number {
    return this.buckets.get(identifier)?.length ?? 0;
  }
}
