import { fullMark } from '../models/record.js';
import type { CubeRecord } from '../models/record.js';
import type { SpecimenType } from '../models/specimen-type.js';
import { classifySpecimenType } from '../layout/type-classifier.js';

export type ProblemKind = 'MissingField' | 'StrengthOutOfRange' | 'MalformedDate' | 'DuplicateMark';

export interface ValidationProblem {
  readonly kind: ProblemKind;
  /** Index of the offending record in the validated sequence */
  readonly index: number;
  readonly mark: string;
  readonly detail: string;
}

export interface ValidationOptions {
  readonly minStrength: number;
  readonly maxStrength: number;
}

export interface RecordSummary {
  readonly totalRecords: number;
  readonly byType: Readonly<Partial<Record<SpecimenType, number>>>;
  readonly averageStrength: Readonly<Partial<Record<SpecimenType, number>>>;
}

export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  minStrength: 20.0,
  maxStrength: 100.0,
};

const TEXT_FIELDS = ['reportNumber', 'dateCast', 'pourLocation'] as const;
const DATE_RE = /^(\d{2})-([A-Za-z]{3})-(\d{4})$/;
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Reports problems in record order; for each record the checks run as
 * missing fields, strength range, date shape, duplicate mark.
 */
export function validateRecords(
  records: readonly CubeRecord[],
  options: ValidationOptions = DEFAULT_VALIDATION_OPTIONS,
): ValidationProblem[] {
  const markCounts = new Map<string, number>();
  for (const record of records) {
    const mark = fullMark(record);
    markCounts.set(mark, (markCounts.get(mark) ?? 0) + 1);
  }

  const problems: ValidationProblem[] = [];

  records.forEach((record, index) => {
    const mark = fullMark(record);
    const report = (kind: ProblemKind, detail: string): void => {
      problems.push({ kind, index, mark, detail });
    };

    for (const field of TEXT_FIELDS) {
      if (record[field].trim().length === 0) {
        report('MissingField', `missing ${field}`);
      }
    }

    if (!Number.isFinite(record.strengthMpa)) {
      report('MissingField', 'missing strengthMpa');
    } else if (
      record.strengthMpa < options.minStrength ||
      record.strengthMpa > options.maxStrength
    ) {
      report(
        'StrengthOutOfRange',
        `strength ${record.strengthMpa} MPa outside ` +
          `${options.minStrength.toFixed(1)}-${options.maxStrength.toFixed(1)} MPa`,
      );
    }

    if (record.dateCast.length > 0 && !isValidDateCast(record.dateCast)) {
      report('MalformedDate', `invalid dateCast '${record.dateCast}'`);
    }

    if ((markCounts.get(mark) ?? 0) > 1) {
      report('DuplicateMark', `duplicate mark '${mark}'`);
    }
  });

  return problems;
}

/** Accepts `DD-Mon-YYYY` with a real month abbreviation and a day that exists in that month. */
export function isValidDateCast(value: string): boolean {
  const match = value.match(DATE_RE);
  if (!match) return false;

  const day = Number.parseInt(match[1], 10);
  const month = MONTHS.indexOf(match[2].toLowerCase());
  const year = Number.parseInt(match[3], 10);
  if (month < 0) return false;

  const daysInMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return day >= 1 && day <= daysInMonth;
}

export function summarizeRecords(records: readonly CubeRecord[]): RecordSummary {
  const byType: Partial<Record<SpecimenType, number>> = {};
  const strengths = new Map<SpecimenType, number[]>();

  for (const record of records) {
    const type = classifySpecimenType(record.markPrefix);
    byType[type] = (byType[type] ?? 0) + 1;
    if (Number.isFinite(record.strengthMpa)) {
      strengths.set(type, [...(strengths.get(type) ?? []), record.strengthMpa]);
    }
  }

  const averageStrength: Partial<Record<SpecimenType, number>> = {};
  for (const [type, values] of strengths) {
    const total = values.reduce((sum, value) => sum + value, 0);
    averageStrength[type] = Math.round((total / values.length) * 100) / 100;
  }

  return { totalRecords: records.length, byType, averageStrength };
}
