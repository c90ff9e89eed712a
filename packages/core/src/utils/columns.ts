import type { SourceSchema } from '../types/index.js';

/**
 * True for null, undefined and strings that are empty after trim
 */
export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && value.trim() === '';
}

/**
 * Required columns that do not appear in the schema, in the order given
 */
export function missingColumns(schema: SourceSchema, required: readonly string[]): string[] {
  const present = new Set(schema.columns);
  return required.filter((name) => !present.has(name));
}
