/**
 * Status Compatibility Rule
 *
 * Decides whether a billing state fits the CRM workflow status. The checks
 * run in a fixed order and the first one that applies decides; a STORNO
 * marker therefore wins over every billing state.
 */

/** Exact phrase the CRM writes when fulfillment is complete (case-sensitive) */
export const COMPLETION_PHRASE = 'Firmendaten Manager Fulfillment abgeschlossen.';

/** Marker for a contractual cancellation (case-insensitive) */
export const CANCELLATION_MARKER = 'gekündigt';

/** Marker for a voided transaction (case-insensitive) */
export const VOID_MARKER = 'STORNO';

export const STATUS_REASONS = {
  ok: 'OK',
  emptyWorkflow: 'Workflow-Status ist leer',
  voided: 'STORNO-Status sollte nicht verrechnet werden',
  activeNotCompleted: 'ACTIVE aber nicht abgeschlossen',
  activeCancelled: 'ACTIVE aber gekündigt im Workflow-Status',
  notCancelled: (state: string) => `${state} aber nicht gekündigt im Workflow-Status`,
  unknownState: (state: string) => `Unbekannter Billing-Status: ${state}`,
} as const;

export type StatusVerdict =
  | { compatible: true; reason: typeof STATUS_REASONS.ok }
  | { compatible: false; reason: string };

const COMPATIBLE: StatusVerdict = { compatible: true, reason: STATUS_REASONS.ok };

function incompatible(reason: string): StatusVerdict {
  return { compatible: false, reason };
}

/**
 * Evaluates (billing state, workflow status) pairs.
 * Pure and total: every input yields a verdict, nothing throws.
 */
export class StatusCompatibilityRule {
  evaluate(
    billingState: string | null | undefined,
    workflowStatus: string | null | undefined
  ): StatusVerdict {
    const workflow = workflowStatus?.normalize('NFC').trim() ?? '';
    if (workflow === '') {
      return incompatible(STATUS_REASONS.emptyWorkflow);
    }

    if (workflow.toUpperCase().includes(VOID_MARKER)) {
      return incompatible(STATUS_REASONS.voided);
    }

    const state = billingState?.trim().toUpperCase() ?? '';
    const cancelled = workflow.toLowerCase().includes(CANCELLATION_MARKER);

    switch (state) {
      case 'ACTIVE':
        if (!workflow.includes(COMPLETION_PHRASE)) {
          return incompatible(STATUS_REASONS.activeNotCompleted);
        }
        return cancelled ? incompatible(STATUS_REASONS.activeCancelled) : COMPATIBLE;

      case 'CANCELLED':
      case 'INACTIVE':
        return cancelled ? COMPATIBLE : incompatible(STATUS_REASONS.notCancelled(state));

      default:
        return incompatible(STATUS_REASONS.unknownState(state));
    }
  }
}

const defaultRule = new StatusCompatibilityRule();

/**
 * Functional form of {@link StatusCompatibilityRule.evaluate}.
 */
export function evaluateStatus(
  billingState: string | null | undefined,
  workflowStatus: string | null | undefined
): StatusVerdict {
  return defaultRule.evaluate(billingState, workflowStatus);
}
