/**
 * Normalizer Module Exports
 */

export { RecordNormalizer } from './record-normalizer.js';
export { categorizeProduct } from './product-category.js';
export {
  cellText,
  cellTextSchema,
  optionalCellTextSchema,
  billingFieldsSchema,
  crmFieldsSchema,
} from './row-schemas.js';
export type { BillingFields, CrmFields } from './row-schemas.js';
export {
  DEFAULT_COLUMNS,
  resolveColumns,
  requiredBillingColumns,
  requiredCrmColumns,
} from './columns.js';
export type { BillingColumns, CrmColumns, ColumnMapping, ColumnOverrides } from './columns.js';
