export interface PageBlock {
  /** Zero-based position of the page within its source document */
  readonly index: number;
  /** Extracted page text with line breaks preserved */
  readonly text: string;
}
