/**
 * Interface exports for audit-core
 */

export type { IReconciliationEngine } from './reconciliation-engine.js';
