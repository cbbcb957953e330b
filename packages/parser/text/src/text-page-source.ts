import type { PageBlock, PageSourcePort } from '@cubesheet/core';
import { InvalidFileFormatError } from '@cubesheet/core';

const PAGE_BREAK = '\f';

/**
 * Reads plain-text dumps of a report, such as the output of a PDF-to-text
 * tool, where pages are separated by form feeds.
 */
export class TextPageSource implements PageSourcePort {
  readonly id = 'text';
  readonly extensions = ['.txt'];

  async readPages(data: ArrayBuffer): Promise<PageBlock[]> {
    let content: string;
    try {
      content = new TextDecoder('utf-8', { fatal: true }).decode(data);
    } catch (error) {
      throw new InvalidFileFormatError(
        `Text report is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    return content
      .replace(/^\uFEFF/, '')
      .replace(/\r\n?/g, '\n')
      .split(PAGE_BREAK)
      .map((text, index) => ({ index, text }));
  }
}
