export interface CubeRecord {
  readonly markPrefix: string;
  readonly markNumber: string;
  readonly markSuffix: string;
  readonly reportNumber: string;
  readonly dateCast: string;
  readonly strengthMpa: number;
  readonly pourLocation: string;
}

export type ColumnId = keyof CubeRecord;

/** Canonical column order any writer must honor. */
export const COLUMN_ORDER: readonly ColumnId[] = [
  'markPrefix',
  'markNumber',
  'markSuffix',
  'reportNumber',
  'dateCast',
  'strengthMpa',
  'pourLocation',
];

export const COLUMN_HEADERS: Readonly<Record<ColumnId, string>> = {
  markPrefix: 'Cube Mark Prefix',
  markNumber: 'Cube Number',
  markSuffix: 'Cube Suffix',
  reportNumber: 'Report Number',
  dateCast: 'Date Cast',
  strengthMpa: 'Compressive Strength (MPa)',
  pourLocation: 'Pour Location',
};

export function fullMark(record: CubeRecord): string {
  return `${record.markPrefix}${record.markNumber}${record.markSuffix}`;
}
