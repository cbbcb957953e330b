import * as path from 'node:path';
import type { ConversionPipeline } from '@cubesheet/core';
import type { SaveConversionFn } from './conversion-saver.js';
import { logConversionResult } from './conversion-report.js';
import { formatConversionError } from './format-conversion-error.js';
import type { Logger } from './logger.js';
import type { ReportFileSystem } from './node-file-system.js';

export interface BatchOptions {
  readonly outputSuffix: string;
}

export interface BatchResult {
  converted: number;
  failed: number;
  /** Reports that yielded no cube records; nothing is written for them */
  empty: number;
}

/** Case-insensitive file name order, with exact order as the tie-breaker. */
export function compareFileNames(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export class BatchRunner {
  constructor(
    private readonly pipeline: ConversionPipeline,
    private readonly fs: ReportFileSystem,
    private readonly saveResult: SaveConversionFn,
    private readonly batchLog: Logger,
    private readonly convertLog: Logger,
    private readonly validateLog: Logger,
    private readonly options: BatchOptions,
  ) {}

  async run(inputDir: string, outputDir: string): Promise<BatchResult> {
    const result: BatchResult = { converted: 0, failed: 0, empty: 0 };

    let names: string[];
    try {
      names = await this.fs.listFiles(inputDir);
    } catch (error) {
      this.batchLog.error(`Directory unreadable: ${inputDir}`, error);
      return { ...result, failed: 1 };
    }

    const reports = names
      .filter((name) => this.pipeline.getSourceForExtension(path.extname(name)) !== undefined)
      .sort(compareFileNames);

    if (reports.length === 0) {
      this.batchLog.warn(`No reports found in ${inputDir}`);
      return result;
    }
    this.batchLog.info(`Found ${reports.length} report(s) in ${inputDir}`);

    for (const name of reports) {
      const outcome = await this.convertReport(inputDir, outputDir, name);
      result[outcome]++;
    }

    this.batchLog.info(
      `Batch complete: ${result.converted} converted, ${result.failed} failed, ` +
        `${result.empty} without records`,
    );
    return result;
  }

  private async convertReport(
    inputDir: string,
    outputDir: string,
    name: string,
  ): Promise<keyof BatchResult> {
    const source = this.pipeline.getSourceForExtension(path.extname(name));
    if (!source) return 'failed';

    const stem = path.basename(name, path.extname(name));
    const baseName = `${stem}${this.options.outputSuffix}`;

    try {
      const data = await this.fs.readFile(path.join(inputDir, name));
      const result = await this.pipeline.convertData(data, source, baseName);
      logConversionResult(name, result, this.convertLog, this.validateLog);

      if (result.extraction.records.length === 0) {
        this.convertLog.error(`No cube records found: ${name}`);
        return 'empty';
      }

      const outputPath = await this.saveResult(result, outputDir, baseName);
      this.convertLog.info(`Converted: ${name} -> ${outputPath}`);
      return 'converted';
    } catch (error) {
      this.convertLog.error(formatConversionError(name, error), error);
      return 'failed';
    }
  }
}
