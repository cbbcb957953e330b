import { MalformedMarkError } from '../exceptions.js';
import type { CubeRecord } from '../models/record.js';
import type { PageBlock } from '../models/page.js';
import {
  findDateCast,
  findPourLocation,
  findReportNumber,
  findSpecimenLines,
} from './field-patterns.js';
import { decomposeMark } from './mark-decomposer.js';
import type { MarkParts } from './mark-decomposer.js';

export type SkipKind = 'MalformedMark' | 'UnparsableStrength';

export interface SkippedLine {
  readonly kind: SkipKind;
  readonly pageIndex: number;
  readonly lineNumber: number;
  readonly token: string;
  readonly detail: string;
}

export interface PageStats {
  readonly pageIndex: number;
  readonly recordCount: number;
}

export interface ExtractionResult {
  readonly records: readonly CubeRecord[];
  readonly skipped: readonly SkippedLine[];
  readonly pages: readonly PageStats[];
}

/** Metadata carried from one page to the next. Pour location is never carried. */
interface CarriedMetadata {
  readonly reportNumber: string | undefined;
  readonly dateCast: string | undefined;
}

interface ExtractionState extends ExtractionResult {
  readonly carried: CarriedMetadata;
}

const STRENGTH_RE = /^\d+(?:\.\d+)?$/;

export function parseStrength(token: string): number | undefined {
  const trimmed = token.trim();
  return STRENGTH_RE.test(trimmed) ? Number.parseFloat(trimmed) : undefined;
}

/**
 * Turns page blocks into records in reading order.
 * Report number and date cast missing from a page fall back to the latest value
 * seen on an earlier page; lines whose mark or strength cannot be read are skipped.
 */
export function extractRecords(pages: readonly PageBlock[]): ExtractionResult {
  const initial: ExtractionState = {
    records: [],
    skipped: [],
    pages: [],
    carried: { reportNumber: undefined, dateCast: undefined },
  };

  const { records, skipped, pages: stats } = pages.reduce(extractPage, initial);
  return { records, skipped, pages: stats };
}

function extractPage(state: ExtractionState, page: PageBlock): ExtractionState {
  const carried: CarriedMetadata = {
    reportNumber: findReportNumber(page.text) ?? state.carried.reportNumber,
    dateCast: findDateCast(page.text) ?? state.carried.dateCast,
  };
  const pourLocation = findPourLocation(page.text) ?? '';

  const records: CubeRecord[] = [];
  const skipped: SkippedLine[] = [];

  for (const line of findSpecimenLines(page.text)) {
    let parts: MarkParts;
    try {
      parts = decomposeMark(line.markToken);
    } catch (error) {
      if (!(error instanceof MalformedMarkError)) throw error;
      skipped.push({
        kind: 'MalformedMark',
        pageIndex: page.index,
        lineNumber: line.lineNumber,
        token: error.token,
        detail: error.message,
      });
      continue;
    }

    const strengthMpa = parseStrength(line.strengthToken);
    if (strengthMpa === undefined) {
      skipped.push({
        kind: 'UnparsableStrength',
        pageIndex: page.index,
        lineNumber: line.lineNumber,
        token: line.strengthToken,
        detail: `Strength '${line.strengthToken}' for mark '${line.markToken}' is not a number`,
      });
      continue;
    }

    records.push({
      markPrefix: parts.prefix,
      markNumber: parts.number,
      markSuffix: parts.suffix,
      reportNumber: carried.reportNumber ?? '',
      dateCast: carried.dateCast ?? '',
      strengthMpa,
      pourLocation,
    });
  }

  return {
    records: [...state.records, ...records],
    skipped: [...state.skipped, ...skipped],
    pages: [...state.pages, { pageIndex: page.index, recordCount: records.length }],
    carried,
  };
}
