/**
 * Record Types
 *
 * Typed rows of the two sources, populated once by the normalizer.
 */

/** Product categories derived from the billing plan name */
export type ProductCategory =
  | 'Firmendaten Manager Basic'
  | 'Firmendaten Manager Plus'
  | 'Firmendaten Manager PRO'
  | 'Sonstige'
  | 'Unbekannt';

/**
 * A billed location from the billing export
 */
export interface BillingRecord {
  /** Location identifier, trimmed and never empty */
  readonly identifier: string;
  /** Salespartner the location is billed through */
  readonly salesPartner: string;
  /** Billing state as exported (ACTIVE, CANCELLED, INACTIVE, ...) */
  readonly state: string;
  /** Location display name */
  readonly displayName: string;
  /** Plan name, null when the column is absent or the cell is empty */
  readonly planName: string | null;
  /** Category derived from planName */
  readonly productCategory: ProductCategory;
}

/**
 * A project from the CRM export
 */
export interface CrmRecord {
  /** Location identifier the project belongs to */
  readonly identifier: string;
  /** Free-text workflow status, '' when empty */
  readonly workflowStatus: string;
  readonly projectName: string;
}
