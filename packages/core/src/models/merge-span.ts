import type { ColumnId } from './record.js';

/** Inclusive row range to be merged into one cell. Rows are 1-based sheet rows. */
export interface MergeSpan {
  readonly column: ColumnId;
  readonly startRow: number;
  readonly endRow: number;
}
