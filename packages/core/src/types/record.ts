/**
 * Row types for data read from a source
 */

/** A single row as read from a source - column name to raw cell value */
export type Row = {
  [column: string]: unknown;
};

/** Result of a read operation */
export interface ReadResult {
  /** The retrieved rows (after filtering) */
  rows: Row[];
  /** Number of rows in the source, before any filtering */
  sourceCount: number;
}
