/**
 * Audit-specific Error Types
 *
 * Classification problems are outcomes, not errors. These codes only cover
 * callers handing the core values it cannot work with.
 */

export type AuditErrorCode =
  | 'INVALID_INPUT'
  | 'INVALID_OPTIONS';

export interface AuditErrorDetails {
  code: AuditErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class AuditError extends Error {
  readonly code: AuditErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: AuditErrorDetails) {
    super(details.message);
    this.name = 'AuditError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
