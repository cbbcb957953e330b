export { PdfPageSource, joinTextItems } from './pdf-page-source.js';
