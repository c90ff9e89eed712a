/**
 * Error exports for audit-core
 */

export { AuditError } from './audit-error.js';
export type { AuditErrorCode, AuditErrorDetails } from './audit-error.js';
