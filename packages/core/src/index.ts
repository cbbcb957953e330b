export * from './models/index.js';

export type {
  ConversionStatePort,
  FileChangeEvent,
  FileSystemPort,
  GeneratorOutput,
  PageSourcePort,
  WatcherPort,
  WorkbookGeneratorPort,
} from './ports/index.js';

export {
  ConversionError,
  FileSystemError,
  InvalidFileFormatError,
  MalformedMarkError,
  ParseError,
} from './exceptions.js';
export type { ConversionPhase, FileSystemOperation } from './exceptions.js';

export {
  findDateCast,
  findPourLocation,
  findReportNumber,
  findSpecimenLines,
} from './extraction/field-patterns.js';
export type { SpecimenLine } from './extraction/field-patterns.js';
export { decomposeMark } from './extraction/mark-decomposer.js';
export type { MarkParts } from './extraction/mark-decomposer.js';
export { extractRecords, parseStrength } from './extraction/record-extractor.js';
export type {
  ExtractionResult,
  PageStats,
  SkipKind,
  SkippedLine,
} from './extraction/record-extractor.js';

export {
  DEFAULT_VALIDATION_OPTIONS,
  isValidDateCast,
  summarizeRecords,
  validateRecords,
} from './validation/validator.js';
export type {
  ProblemKind,
  RecordSummary,
  ValidationOptions,
  ValidationProblem,
} from './validation/validator.js';

export { classifySpecimenType } from './layout/type-classifier.js';
export { groupBySpecimenType } from './layout/grouping.js';
export type { GroupedRecords } from './layout/grouping.js';
export {
  computePairSpans,
  computeRunLengthSpans,
  DEFAULT_MERGE_LAYOUT_OPTIONS,
  layoutGroup,
} from './layout/merge-layout.js';
export type { GroupMergeLayout, MergeLayoutOptions } from './layout/merge-layout.js';
export {
  buildWorkbookLayout,
  DEFAULT_WORKBOOK_LAYOUT_OPTIONS,
  UNRECOGNIZED_SHEET_NAME,
} from './layout/workbook-layout.js';
export type {
  SheetLayout,
  WorkbookLayout,
  WorkbookLayoutOptions,
} from './layout/workbook-layout.js';

export { DEFAULT_PROCESS_OPTIONS, processPages } from './api.js';
export type { ProcessedPages, ProcessOptions } from './api.js';

export { ConversionPipeline } from './conversion-pipeline.js';
export type { ConversionPipelineOptions, ConversionResult } from './conversion-pipeline.js';
