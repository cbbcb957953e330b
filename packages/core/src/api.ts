import type { PageBlock } from './models/page.js';
import { extractRecords } from './extraction/record-extractor.js';
import type { ExtractionResult } from './extraction/record-extractor.js';
import {
  DEFAULT_VALIDATION_OPTIONS,
  summarizeRecords,
  validateRecords,
} from './validation/validator.js';
import type { RecordSummary, ValidationOptions, ValidationProblem } from './validation/validator.js';
import { buildWorkbookLayout, DEFAULT_WORKBOOK_LAYOUT_OPTIONS } from './layout/workbook-layout.js';
import type { WorkbookLayout, WorkbookLayoutOptions } from './layout/workbook-layout.js';

export interface ProcessOptions {
  readonly validate: boolean;
  readonly validation: ValidationOptions;
  readonly layout: WorkbookLayoutOptions;
}

export interface ProcessedPages {
  readonly extraction: ExtractionResult;
  /** Empty when validation is disabled */
  readonly problems: readonly ValidationProblem[];
  readonly summary: RecordSummary | null;
  readonly layout: WorkbookLayout;
}

export const DEFAULT_PROCESS_OPTIONS: ProcessOptions = {
  validate: true,
  validation: DEFAULT_VALIDATION_OPTIONS,
  layout: DEFAULT_WORKBOOK_LAYOUT_OPTIONS,
};

/** Extraction, optional validation and layout, in that order. */
export function processPages(
  pages: readonly PageBlock[],
  options: ProcessOptions = DEFAULT_PROCESS_OPTIONS,
): ProcessedPages {
  const extraction = extractRecords(pages);
  const problems = options.validate
    ? validateRecords(extraction.records, options.validation)
    : [];
  const summary = options.validate ? summarizeRecords(extraction.records) : null;
  const layout = buildWorkbookLayout(extraction.records, options.layout);

  return { extraction, problems, summary, layout };
}
