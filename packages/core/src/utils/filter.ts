/**
 * Filter utilities for selecting rows in memory
 */

import type { FilterCondition, FilterOptions, Row } from '../types/index.js';
import { isBlank } from './columns.js';

/**
 * Apply a single filter condition to a cell value
 */
function matchCondition(value: unknown, condition: FilterCondition): boolean {
  switch (condition.op) {
    case 'in':
      return condition.value.includes(value);

    case 'present':
      return !isBlank(value);
  }
}

/**
 * Check if a row matches all filter conditions
 */
function matchRow(row: Row, conditions: FilterCondition[]): boolean {
  return conditions.every((condition) => matchCondition(row[condition.column], condition));
}

/**
 * Apply filter options to rows, keeping source order
 */
export function applyFilter(rows: Row[], options?: FilterOptions): Row[] {
  const where = options?.where ?? [];
  if (where.length === 0) {
    return rows;
  }
  return rows.filter((row) => matchRow(row, where));
}
