/**
 * Rules Module Exports
 */

export {
  StatusCompatibilityRule,
  evaluateStatus,
  STATUS_REASONS,
  COMPLETION_PHRASE,
  CANCELLATION_MARKER,
  VOID_MARKER,
} from './status-rule.js';
export type { StatusVerdict } from './status-rule.js';
