import type { ConversionResult, SpecimenType } from '@cubesheet/core';
import { SPECIMEN_TYPES } from '@cubesheet/core';
import type { Logger } from './logger.js';

const SUMMARY_TYPES: readonly SpecimenType[] = [...SPECIMEN_TYPES, 'Unknown'];

/**
 * Logs per-page record counts and skipped lines, then, when validation ran,
 * each problem and the per-type statistics. Problems are reported, never fatal.
 */
export function logConversionResult(
  fileName: string,
  result: ConversionResult,
  convertLog: Logger,
  validateLog: Logger,
): void {
  const { extraction, problems, summary } = result;

  for (const page of extraction.pages) {
    convertLog.info(`${fileName}: page ${page.pageIndex + 1}: ${page.recordCount} record(s)`);
  }
  for (const line of extraction.skipped) {
    convertLog.warn(
      `${fileName}: page ${line.pageIndex + 1}, line ${line.lineNumber}: skipped (${line.kind}): ${line.detail}`,
    );
  }
  convertLog.info(`${fileName}: extracted ${extraction.records.length} record(s)`);

  if (!summary) return;

  for (const problem of problems) {
    validateLog.warn(
      `${fileName}: record ${problem.index + 1} (${problem.mark}): ${problem.kind}: ${problem.detail}`,
    );
  }
  validateLog.info(
    `${fileName}: ${problems.length} problem(s) in ${summary.totalRecords} record(s)`,
  );
  for (const type of SUMMARY_TYPES) {
    const count = summary.byType[type];
    if (count === undefined) continue;
    const average = summary.averageStrength[type];
    const averageText = average === undefined ? 'n/a' : `${average.toFixed(2)} MPa`;
    validateLog.info(`${fileName}: ${type}: ${count} record(s), average strength ${averageText}`);
  }
}
