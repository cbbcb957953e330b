import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConversionPipeline } from '../src/conversion-pipeline.js';
import { DEFAULT_PROCESS_OPTIONS } from '../src/api.js';
import { ConversionError } from '../src/exceptions.js';
import type { ConversionStatePort } from '../src/ports/conversion-state.js';
import type { PageSourcePort } from '../src/ports/page-source.js';
import type { FileChangeEvent } from '../src/ports/watcher.js';
import type { WorkbookGeneratorPort } from '../src/ports/workbook-generator.js';
import type { PageBlock } from '../src/models/index.js';

const pages: PageBlock[] = [
  { index: 0, text: 'Report No.: R1\nDate Cast: 02-Jul-2025\nLocation: Slab\n20250702-45D-1A 40.5' },
];

function createMockSource(): PageSourcePort {
  return {
    id: 'mock',
    extensions: ['.pdf'],
    readPages: vi.fn().mockResolvedValue(pages),
  };
}

function createMockGenerator(): WorkbookGeneratorPort {
  return {
    id: 'mock',
    displayName: 'Mock',
    extension: '.xlsx',
    generate: vi.fn().mockReturnValue({ content: new Uint8Array([1, 2, 3]), extension: '.xlsx' }),
  };
}

function createEvent(overrides?: Partial<FileChangeEvent>): FileChangeEvent {
  return {
    id: '/reports/july.pdf',
    name: 'july.pdf',
    extension: '.pdf',
    mtime: 1700000000000,
    readData: vi.fn().mockResolvedValue(new ArrayBuffer(0)),
    ...overrides,
  };
}

describe('ConversionPipeline', () => {
  let source: PageSourcePort;
  let generator: WorkbookGeneratorPort;
  let conversionState: ConversionStatePort;

  beforeEach(() => {
    vi.restoreAllMocks();
    source = createMockSource();
    generator = createMockGenerator();
    conversionState = {
      getLastConvertedMtime: vi.fn().mockResolvedValue(undefined),
      setLastConvertedMtime: vi.fn().mockResolvedValue(undefined),
    };
  });

  function createPipeline(): ConversionPipeline {
    return new ConversionPipeline(
      new Map([['.pdf', source]]),
      generator,
      conversionState,
      DEFAULT_PROCESS_OPTIONS,
    );
  }

  it('converts a file with a supported extension', async () => {
    const event = createEvent();

    const result = await createPipeline().handleFileChange(event);

    expect(result?.extraction.records).toHaveLength(1);
    expect(result?.output.content).toEqual(new Uint8Array([1, 2, 3]));
    expect(event.readData).toHaveBeenCalled();
    expect(generator.generate).toHaveBeenCalledWith(expect.anything(), 'july');
  });

  it('matches extensions case-insensitively', () => {
    expect(createPipeline().getSourceForExtension('.PDF')).toBe(source);
  });

  it('returns null for an unsupported extension and logs the skip', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const event = createEvent({ extension: '.docx', name: 'july.docx' });

    const result = await createPipeline().handleFileChange(event);

    expect(result).toBeNull();
    expect(event.readData).not.toHaveBeenCalled();
    expect(consoleSpy).toHaveBeenCalledWith('[Cubesheet:Convert] Skipped (unsupported): july.docx');
  });

  it('skips a file not modified since its last conversion', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    conversionState.getLastConvertedMtime = vi.fn().mockResolvedValue(1700000000000);
    const event = createEvent({ mtime: 1700000000000 });

    const result = await createPipeline().handleFileChange(event);

    expect(result).toBeNull();
    expect(event.readData).not.toHaveBeenCalled();
    expect(consoleSpy).toHaveBeenCalledWith('[Cubesheet:Convert] Skipped (up-to-date): july.pdf');
  });

  it('converts a file modified after its last conversion', async () => {
    conversionState.getLastConvertedMtime = vi.fn().mockResolvedValue(1699999999999);

    const result = await createPipeline().handleFileChange(createEvent());

    expect(result).not.toBeNull();
  });

  it('wraps page source failures as a read-phase conversion error', async () => {
    source.readPages = vi.fn().mockRejectedValue(new Error('broken xref'));

    const error = await createPipeline()
      .convertData(new ArrayBuffer(0), source, 'july')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({
      phase: 'read',
      message: 'Conversion failed at read: broken xref',
    });
  });

  it('wraps generator failures as a generate-phase conversion error', async () => {
    generator.generate = vi.fn().mockRejectedValue(new Error('disk full'));

    await expect(
      createPipeline().convertData(new ArrayBuffer(0), source, 'july'),
    ).rejects.toMatchObject({ phase: 'generate', name: 'ConversionError' });
  });

  it('reports validation problems with the result', async () => {
    source.readPages = vi.fn().mockResolvedValue([
      { index: 0, text: '20250702-45D-1A 40.5' },
    ]);

    const result = await createPipeline().convertData(new ArrayBuffer(0), source, 'july');

    expect(result.problems.map((p) => p.detail)).toEqual([
      'missing reportNumber',
      'missing dateCast',
      'missing pourLocation',
    ]);
    expect(result.summary?.totalRecords).toBe(1);
  });
});
