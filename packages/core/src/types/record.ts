/**
 * Record types for data exchange between the fetch, flatten and write stages
 */

/** Generic record type - a row of data */
export type Record = {
  [key: string]: unknown;
};

/** Result of a write operation */
export interface WriteResult {
  /** Number of rows written (header excluded) */
  rows: number;
  /** Columns written, in output order */
  columns: string[];
  /** Absolute path of the written file */
  filePath: string;
}
