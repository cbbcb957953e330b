import type { ColumnId, CubeRecord } from '../models/record.js';
import type { MergeSpan } from '../models/merge-span.js';

export interface MergeLayoutOptions {
  /** Column merged over runs of equal values */
  readonly runLengthColumn: ColumnId;
  /** Columns merged two rows at a time regardless of value */
  readonly pairColumns: readonly ColumnId[];
  /** Rows above the first data row, owned by the writer */
  readonly headerRows: number;
}

export interface GroupMergeLayout {
  readonly runLength: readonly MergeSpan[];
  readonly pairs: readonly MergeSpan[];
}

export const DEFAULT_MERGE_LAYOUT_OPTIONS: MergeLayoutOptions = {
  runLengthColumn: 'pourLocation',
  pairColumns: ['markPrefix', 'markNumber', 'reportNumber', 'dateCast'],
  headerRows: 1,
};

/** One span per maximal run of at least two consecutive equal values. */
export function computeRunLengthSpans<T>(
  values: readonly T[],
  column: ColumnId,
  headerRows: number,
): MergeSpan[] {
  const spans: MergeSpan[] = [];
  let start = 0;

  while (start < values.length) {
    let end = start;
    while (end + 1 < values.length && values[end + 1] === values[start]) {
      end++;
    }
    if (end > start) {
      spans.push({ column, startRow: headerRows + start + 1, endRow: headerRows + end + 1 });
    }
    start = end + 1;
  }

  return spans;
}

/** Rows (1,2), (3,4), ... per column; a trailing odd row is left alone. */
export function computePairSpans(
  rowCount: number,
  columns: readonly ColumnId[],
  headerRows: number,
): MergeSpan[] {
  const spans: MergeSpan[] = [];

  for (const column of columns) {
    for (let row = 1; row + 1 <= rowCount; row += 2) {
      spans.push({ column, startRow: headerRows + row, endRow: headerRows + row + 1 });
    }
  }

  return spans;
}

/**
 * Run-length spans for the run-length column and pair spans for the pair columns.
 * The run-length column and repeated entries are left out of the pair columns,
 * so no two spans cover the same cell.
 */
export function layoutGroup(
  records: readonly CubeRecord[],
  options: MergeLayoutOptions = DEFAULT_MERGE_LAYOUT_OPTIONS,
): GroupMergeLayout {
  const column = options.runLengthColumn;
  const pairColumns = [...new Set(options.pairColumns)].filter((pair) => pair !== column);
  return {
    runLength: computeRunLengthSpans(
      records.map((record) => record[column]),
      column,
      options.headerRows,
    ),
    pairs: computePairSpans(records.length, pairColumns, options.headerRows),
  };
}
