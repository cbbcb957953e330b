export { XlsxWorkbookGenerator, uniqueSheetNames } from './xlsx-workbook-generator.js';
export { columnLetter, escXml, sanitizeSheetName } from './ooxml.js';
