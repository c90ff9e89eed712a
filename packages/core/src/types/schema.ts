/**
 * Header of a tabular source
 */
export interface SourceSchema {
  /** Source name */
  name: string;
  /** Column headers in source order */
  columns: string[];
}
