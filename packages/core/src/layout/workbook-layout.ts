import { COLUMN_HEADERS, COLUMN_ORDER } from '../models/record.js';
import type { ColumnId, CubeRecord } from '../models/record.js';
import type { MergeSpan } from '../models/merge-span.js';
import { SPECIMEN_TYPES } from '../models/specimen-type.js';
import { groupBySpecimenType } from './grouping.js';
import { DEFAULT_MERGE_LAYOUT_OPTIONS, layoutGroup } from './merge-layout.js';

export interface SheetLayout {
  readonly name: string;
  readonly columns: readonly ColumnId[];
  readonly header: readonly string[];
  readonly rows: readonly CubeRecord[];
  readonly merges: readonly MergeSpan[];
}

export interface WorkbookLayout {
  readonly sheets: readonly SheetLayout[];
}

export interface WorkbookLayoutOptions {
  readonly rawSheetName: string;
  readonly pairColumns: readonly ColumnId[];
  readonly includeUnrecognized: boolean;
}

export const DEFAULT_WORKBOOK_LAYOUT_OPTIONS: WorkbookLayoutOptions = {
  rawSheetName: 'Raw',
  pairColumns: DEFAULT_MERGE_LAYOUT_OPTIONS.pairColumns,
  includeUnrecognized: false,
};

export const UNRECOGNIZED_SHEET_NAME = 'Unrecognized';

const HEADER = COLUMN_ORDER.map((column) => COLUMN_HEADERS[column]);

/**
 * Raw sheet with every record, then one sheet per specimen type in fixed order.
 * Type sheets are present even when empty.
 */
export function buildWorkbookLayout(
  records: readonly CubeRecord[],
  options: WorkbookLayoutOptions = DEFAULT_WORKBOOK_LAYOUT_OPTIONS,
): WorkbookLayout {
  const { groups, unrecognized } = groupBySpecimenType(records);

  const sheets: SheetLayout[] = [sheet(options.rawSheetName, records, [])];

  for (const type of SPECIMEN_TYPES) {
    sheets.push(groupSheet(type, groups[type], options));
  }

  if (options.includeUnrecognized) {
    sheets.push(groupSheet(UNRECOGNIZED_SHEET_NAME, unrecognized, options));
  }

  return { sheets };
}

function groupSheet(
  name: string,
  rows: readonly CubeRecord[],
  options: WorkbookLayoutOptions,
): SheetLayout {
  const merges = layoutGroup(rows, {
    ...DEFAULT_MERGE_LAYOUT_OPTIONS,
    pairColumns: options.pairColumns,
  });
  return sheet(name, rows, [...merges.pairs, ...merges.runLength]);
}

function sheet(name: string, rows: readonly CubeRecord[], merges: readonly MergeSpan[]): SheetLayout {
  return { name, columns: COLUMN_ORDER, header: HEADER, rows, merges };
}
