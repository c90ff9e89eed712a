/**
 * Filter syntax for selecting rows from a source
 */

export type FilterOperator =
  | 'in'       // value in array
  | 'present'; // value is not null and not blank after trim

export type FilterCondition =
  | { column: string; op: 'in'; value: readonly unknown[] }
  | { column: string; op: 'present' };

export interface FilterOptions {
  /** Filter conditions (AND logic) */
  where?: FilterCondition[];
}
