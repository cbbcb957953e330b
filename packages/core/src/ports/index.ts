export type { ConversionStatePort } from './conversion-state.js';
export type { FileSystemPort } from './file-system.js';
export type { PageSourcePort } from './page-source.js';
export type { FileChangeEvent, WatcherPort } from './watcher.js';
export type { GeneratorOutput, WorkbookGeneratorPort } from './workbook-generator.js';
