import type { PageSourcePort } from './ports/page-source.js';
import type { ConversionStatePort } from './ports/conversion-state.js';
import type { FileChangeEvent } from './ports/watcher.js';
import type { GeneratorOutput, WorkbookGeneratorPort } from './ports/workbook-generator.js';
import type { PageBlock } from './models/page.js';
import { ConversionError } from './exceptions.js';
import type { ExtractionResult } from './extraction/record-extractor.js';
import type { RecordSummary, ValidationProblem } from './validation/validator.js';
import { processPages } from './api.js';
import type { ProcessOptions } from './api.js';

export type ConversionPipelineOptions = ProcessOptions;

export interface ConversionResult {
  readonly output: GeneratorOutput;
  readonly extraction: ExtractionResult;
  /** Empty when validation is disabled */
  readonly problems: readonly ValidationProblem[];
  readonly summary: RecordSummary | null;
}

export class ConversionPipeline {
  private readonly sourceMap: Map<string, PageSourcePort>;

  constructor(
    sources: Map<string, PageSourcePort>,
    private readonly generator: WorkbookGeneratorPort,
    private readonly conversionState: ConversionStatePort,
    private readonly options: ConversionPipelineOptions,
  ) {
    this.sourceMap = sources;
  }

  getSourceForExtension(ext: string): PageSourcePort | undefined {
    return this.sourceMap.get(ext.toLowerCase());
  }

  async handleFileChange(event: FileChangeEvent): Promise<ConversionResult | null> {
    const source = this.getSourceForExtension(event.extension);
    if (!source) {
      console.log(`[Cubesheet:Convert] Skipped (unsupported): ${event.name}`);
      return null;
    }

    const lastMtime = await this.conversionState.getLastConvertedMtime(event.id);
    if (lastMtime !== undefined && event.mtime <= lastMtime) {
      console.log(`[Cubesheet:Convert] Skipped (up-to-date): ${event.name}`);
      return null;
    }

    const data = await event.readData();
    const baseName = event.name.replace(/\.[^/.]+$/, '');
    return this.convertData(data, source, baseName);
  }

  async convertData(
    data: ArrayBuffer,
    source: PageSourcePort,
    outputName: string,
  ): Promise<ConversionResult> {
    let pages: PageBlock[];
    try {
      pages = await source.readPages(data);
    } catch (error) {
      throw new ConversionError('read', error);
    }

    const { extraction, problems, summary, layout } = processPages(pages, this.options);

    let output: GeneratorOutput;
    try {
      output = await this.generator.generate(layout, outputName);
    } catch (error) {
      throw new ConversionError('generate', error);
    }

    return { output, extraction, problems, summary };
  }
}
