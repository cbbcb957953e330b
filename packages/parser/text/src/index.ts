export { TextPageSource } from './text-page-source.js';
