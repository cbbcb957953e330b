import { InvalidFileFormatError } from '@cubesheet/core';
import { describe, expect, it } from 'vitest';
import { TextPageSource } from '../src/text-page-source.js';

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

function encode(text: string): ArrayBuffer {
  return toArrayBuffer(new TextEncoder().encode(text));
}

describe('TextPageSource', () => {
  const source = new TextPageSource();

  it('supports .txt extension', () => {
    expect(source.extensions).toEqual(['.txt']);
  });

  it('splits pages on form feeds', async () => {
    const pages = await source.readPages(encode('Report No.: R1\n20250702-45D-1A 40.5\f20250702-45D-1B 41'));

    expect(pages).toEqual([
      { index: 0, text: 'Report No.: R1\n20250702-45D-1A 40.5' },
      { index: 1, text: '20250702-45D-1B 41' },
    ]);
  });

  it('treats a file without form feeds as a single page', async () => {
    expect(await source.readPages(encode('only page'))).toEqual([{ index: 0, text: 'only page' }]);
  });

  it('normalizes line endings and drops a byte order mark', async () => {
    const pages = await source.readPages(encode('\uFEFFline one\r\nline two\rline three'));

    expect(pages).toEqual([{ index: 0, text: 'line one\nline two\nline three' }]);
  });

  it('rejects bytes that are not UTF-8', async () => {
    const data = toArrayBuffer(new Uint8Array([0xff, 0xfe, 0xfd]));

    await expect(source.readPages(data)).rejects.toThrow(InvalidFileFormatError);
  });
});
