import * as path from 'node:path';
import type { ConversionPipeline, ConversionStatePort, FileChangeEvent } from '@cubesheet/core';
import type { SaveConversionFn } from './conversion-saver.js';
import { logConversionResult } from './conversion-report.js';
import type { Logger } from './logger.js';

export interface ProcessReportContext {
  readonly pipeline: ConversionPipeline;
  readonly conversionState: ConversionStatePort;
  readonly save: SaveConversionFn;
  readonly outputDir: string;
  readonly outputSuffix: string;
  readonly convertLog: Logger;
  readonly validateLog: Logger;
}

/**
 * Converts one watched report. Returns false when the pipeline skipped it or it
 * held no records. The mtime is recorded once the report is handled, so an
 * unchanged file is not converted twice.
 */
export async function processReport(
  event: FileChangeEvent,
  context: ProcessReportContext,
): Promise<boolean> {
  const result = await context.pipeline.handleFileChange(event);
  if (!result) return false;

  logConversionResult(event.name, result, context.convertLog, context.validateLog);

  if (result.extraction.records.length === 0) {
    await context.conversionState.setLastConvertedMtime(event.id, event.mtime);
    context.convertLog.error(`No cube records found: ${event.name}`);
    return false;
  }

  const stem = path.basename(event.name, path.extname(event.name));
  const outputPath = await context.save(result, context.outputDir, `${stem}${context.outputSuffix}`);
  await context.conversionState.setLastConvertedMtime(event.id, event.mtime);
  context.convertLog.info(`Converted: ${event.name} -> ${outputPath}`);
  return true;
}
