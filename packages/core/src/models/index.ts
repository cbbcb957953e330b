export type { CubeRecord, ColumnId } from './record.js';
export { COLUMN_ORDER, COLUMN_HEADERS, fullMark } from './record.js';
export type { KnownSpecimenType, SpecimenType } from './specimen-type.js';
export { SPECIMEN_TYPES } from './specimen-type.js';
export type { PageBlock } from './page.js';
export type { MergeSpan } from './merge-span.js';
