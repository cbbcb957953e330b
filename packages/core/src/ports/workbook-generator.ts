import type { WorkbookLayout } from '../layout/workbook-layout.js';

export interface GeneratorOutput {
  readonly content: Uint8Array;
  readonly extension: string;
}

export interface WorkbookGeneratorPort {
  readonly id: string;
  readonly displayName: string;
  readonly extension: string;
  generate(layout: WorkbookLayout, outputName: string): GeneratorOutput | Promise<GeneratorOutput>;
}
