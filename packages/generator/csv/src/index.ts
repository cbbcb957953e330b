export { CsvWorkbookGenerator, DEFAULT_CSV_OPTIONS } from './csv-workbook-generator.js';
export type { CsvOptions } from './csv-workbook-generator.js';
