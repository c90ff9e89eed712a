/**
 * Zod schemas coercing raw cells into the fields of typed records
 */

import { z } from 'zod';

/**
 * Convert a raw cell to trimmed text.
 * Numbers keep their decimal rendering, dates become ISO strings.
 */
export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : '';
  }
  return String(value).normalize('NFC').trim();
}

/** Any cell as trimmed text, '' when empty */
export const cellTextSchema = z.unknown().transform(cellText);

/** Any cell as trimmed text, null when empty */
export const optionalCellTextSchema = z
  .unknown()
  .transform((value) => cellText(value) || null);

export const billingFieldsSchema = z.object({
  identifier: cellTextSchema,
  salesPartner: cellTextSchema,
  state: cellTextSchema,
  displayName: cellTextSchema,
  planName: optionalCellTextSchema,
});

export const crmFieldsSchema = z.object({
  identifier: cellTextSchema,
  workflowStatus: cellTextSchema,
  projectName: cellTextSchema,
});

export type BillingFields = z.infer<typeof billingFieldsSchema>;
export type CrmFields = z.infer<typeof crmFieldsSchema>;
