import type { ConversionStatePort, ProcessOptions, WorkbookGeneratorPort } from '@cubesheet/core';
import { ConversionPipeline } from '@cubesheet/core';
import { CsvWorkbookGenerator } from '@cubesheet/generator-csv';
import { XlsxWorkbookGenerator } from '@cubesheet/generator-xlsx';
import { PdfPageSource } from '@cubesheet/parser-pdf';
import { TextPageSource } from '@cubesheet/parser-text';
import { PageSourceRegistry } from './page-source-registry.js';
import type { CubesheetSettings, OutputFormat } from './settings.js';

export function createPageSourceRegistry(): PageSourceRegistry {
  const registry = new PageSourceRegistry();
  registry.register(new PdfPageSource());
  registry.register(new TextPageSource());
  return registry;
}

export function createGenerator(
  format: OutputFormat,
  settings: CubesheetSettings,
): WorkbookGeneratorPort {
  switch (format) {
    case 'xlsx':
      return new XlsxWorkbookGenerator();
    case 'csv':
      return new CsvWorkbookGenerator({ delimiter: settings.csv.delimiter });
  }
}

export function toProcessOptions(settings: CubesheetSettings): ProcessOptions {
  return {
    validate: settings.validate,
    validation: settings.validation,
    layout: settings.layout,
  };
}

export function createPipeline(
  registry: PageSourceRegistry,
  settings: CubesheetSettings,
  conversionState: ConversionStatePort,
): ConversionPipeline {
  return new ConversionPipeline(
    registry.toMap(),
    createGenerator(settings.outputFormat, settings),
    conversionState,
    toProcessOptions(settings),
  );
}
