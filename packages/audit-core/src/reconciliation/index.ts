/**
 * Reconciliation Module Exports
 */

export { ReconciliationEngine } from './reconciliation-engine.js';
export { CrmIndex } from './crm-index.js';
