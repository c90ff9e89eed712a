import { describe, expect, it } from 'vitest';
import {
  COMPLETION_PHRASE,
  STATUS_REASONS,
  StatusCompatibilityRule,
  evaluateStatus,
} from '../src/index.js';

describe('StatusCompatibilityRule', () => {
  const rule = new StatusCompatibilityRule();

  it('accepts an active location with completed fulfillment', () => {
    expect(rule.evaluate('ACTIVE', 'Firmendaten Manager Fulfillment abgeschlossen.')).toEqual({
      compatible: true,
      reason: 'OK',
    });
  });

  it('rejects an active location cancelled in the workflow', () => {
    const verdict = rule.evaluate(
      'ACTIVE',
      'Firmendaten Manager Fulfillment abgeschlossen. gekündigt am 1.1.'
    );
    expect(verdict).toEqual({
      compatible: false,
      reason: 'ACTIVE aber gekündigt im Workflow-Status',
    });
  });

  it('accepts a cancelled location with a cancelled contract', () => {
    expect(rule.evaluate('CANCELLED', 'Vertrag gekündigt')).toEqual({
      compatible: true,
      reason: 'OK',
    });
  });

  it('recognizes a cancellation written with a combining diaeresis', () => {
    expect(evaluateStatus('INACTIVE', 'Vertrag geku\u0308ndigt')).toEqual({
      compatible: true,
      reason: 'OK',
    });
    expect(evaluateStatus('ACTIVE', `${COMPLETION_PHRASE} geku\u0308ndigt`)).toEqual({
      compatible: false,
      reason: STATUS_REASONS.activeCancelled,
    });
  });

  it('rejects an empty workflow status', () => {
    expect(rule.evaluate('INACTIVE', '')).toEqual({
      compatible: false,
      reason: 'Workflow-Status ist leer',
    });
    expect(rule.evaluate('ACTIVE', '   ').reason).toBe(STATUS_REASONS.emptyWorkflow);
    expect(rule.evaluate('ACTIVE', null).reason).toBe(STATUS_REASONS.emptyWorkflow);
  });

  it('lets STORNO win over every billing state', () => {
    for (const state of ['ACTIVE', 'CANCELLED', 'INACTIVE', 'PAUSED', '']) {
      expect(rule.evaluate(state, `${COMPLETION_PHRASE} storno gekündigt`)).toEqual({
        compatible: false,
        reason: 'STORNO-Status sollte nicht verrechnet werden',
      });
    }
  });

  it('rejects an active location without the completion phrase', () => {
    expect(rule.evaluate('ACTIVE', 'Fulfillment läuft').reason).toBe(
      'ACTIVE aber nicht abgeschlossen'
    );
  });

  it('matches the completion phrase case-sensitively', () => {
    expect(rule.evaluate('ACTIVE', COMPLETION_PHRASE.toLowerCase()).compatible).toBe(false);
  });

  it('normalizes the billing state', () => {
    expect(rule.evaluate(' active ', COMPLETION_PHRASE).compatible).toBe(true);
    expect(rule.evaluate('inactive', 'GEKÜNDIGT').compatible).toBe(true);
  });

  it('rejects cancelled or inactive locations that are not cancelled in the workflow', () => {
    expect(rule.evaluate('CANCELLED', COMPLETION_PHRASE).reason).toBe(
      'CANCELLED aber nicht gekündigt im Workflow-Status'
    );
    expect(rule.evaluate('inactive', 'offen').reason).toBe(
      'INACTIVE aber nicht gekündigt im Workflow-Status'
    );
  });

  it('reports unknown billing states', () => {
    expect(rule.evaluate('PAUSED', 'offen').reason).toBe('Unbekannter Billing-Status: PAUSED');
    expect(rule.evaluate(undefined, 'offen').reason).toBe('Unbekannter Billing-Status: ');
  });

  it('returns identical verdicts for identical input', () => {
    const first = evaluateStatus('ACTIVE', 'Vertrag gekündigt');
    const second = evaluateStatus('ACTIVE', 'Vertrag gekündigt');
    expect(second).toEqual(first);
    expect(first.reason).toBe('ACTIVE aber nicht abgeschlossen');
  });
});
