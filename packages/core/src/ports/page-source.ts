import type { PageBlock } from '../models/page.js';

export interface PageSourcePort {
  /** Unique identifier for this page source */
  readonly id: string;

  /** Supported file extensions */
  readonly extensions: string[];

  /** Read the document into one text block per page, in page order */
  readPages(data: ArrayBuffer): Promise<PageBlock[]>;
}
