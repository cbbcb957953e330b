import type { FileChangeEvent, WatcherPort } from '@cubesheet/core';
import { TextPageSource } from '@cubesheet/parser-text';
import type { ReportFolderWatcherOptions } from '@cubesheet/watcher-chokidar';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CliDependencies } from '../src/cli.js';
import {
  applyOverrides,
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
  parseCliArgs,
  runCli,
  USAGE,
  UsageError,
} from '../src/cli.js';
import { PageSourceRegistry } from '../src/page-source-registry.js';
import { DEFAULT_SETTINGS } from '../src/settings.js';
import { createEvent, MemoryFileSystem, REPORT_CSV, REPORT_TEXT } from './helpers/fakes.js';

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: vi.fn(),
}));

class FakeWatcher implements WatcherPort {
  fileHandler: ((event: FileChangeEvent) => Promise<void>) | null = null;
  started = false;
  stopped = false;

  onFileChange(handler: (event: FileChangeEvent) => Promise<void>): void {
    this.fileHandler = handler;
  }

  onError(): void {}

  async start(): Promise<void> {
    this.started = true;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }
}

function notFound(): Error {
  return Object.assign(new Error('no such file'), { code: 'ENOENT' });
}

function textOnlyRegistry(): PageSourceRegistry {
  const registry = new PageSourceRegistry();
  registry.register(new TextPageSource());
  return registry;
}

describe('parseCliArgs', () => {
  it('reads a convert command with its flags', () => {
    const args = parseCliArgs(['convert', 'in.pdf', 'out.xlsx', '--validate', '-c', 'site.json']);

    expect(args).toEqual({
      command: 'convert',
      positionals: ['in.pdf', 'out.xlsx'],
      validate: true,
      format: undefined,
      includeUnrecognized: undefined,
      outputDir: undefined,
      config: 'site.json',
      help: false,
    });
  });

  it('reads the output folder of a batch run', () => {
    const args = parseCliArgs(['batch', 'reports', '-o', 'sheets', '--format', 'csv']);

    expect(args.outputDir).toBe('sheets');
    expect(args.format).toBe('csv');
  });

  it('accepts help without a command', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it.each([
    [[], 'Missing command'],
    [['export', 'a.pdf'], 'Unknown command: export'],
    [['convert', 'a.pdf'], 'convert expects 2 argument(s), got 1'],
    [['batch'], 'batch expects 1 argument(s), got 0'],
    [['watch', 'a', 'b'], 'watch expects 1 argument(s), got 2'],
    [['batch', 'reports', '--format', 'ods'], 'Unknown format: ods (expected xlsx or csv)'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new UsageError(message));
  });

  it('rejects an unknown flag', () => {
    expect(() => parseCliArgs(['batch', 'reports', '--verbose'])).toThrow(UsageError);
  });
});

describe('applyOverrides', () => {
  it('lets flags win over settings', () => {
    const args = parseCliArgs(['batch', 'reports', '--validate', '--include-unrecognized']);

    const settings = applyOverrides(DEFAULT_SETTINGS, args);

    expect(settings.validate).toBe(true);
    expect(settings.layout.includeUnrecognized).toBe(true);
    expect(settings.layout.pairColumns).toEqual(DEFAULT_SETTINGS.layout.pairColumns);
  });

  it('keeps settings where no flag is given', () => {
    const settings = applyOverrides(
      { ...DEFAULT_SETTINGS, outputFormat: 'csv', validate: true },
      parseCliArgs(['batch', 'reports']),
    );

    expect(settings.outputFormat).toBe('csv');
    expect(settings.validate).toBe(true);
  });
});

describe('runCli', () => {
  let fs: MemoryFileSystem;
  let watcher: FakeWatcher;
  let shutdown: () => void;
  let deps: CliDependencies;

  beforeEach(() => {
    fs = new MemoryFileSystem({ '/reports/july.txt': REPORT_TEXT });
    watcher = new FakeWatcher();
    shutdown = () => undefined;
    deps = {
      fileSystem: fs,
      readText: vi.fn().mockRejectedValue(notFound()),
      createRegistry: textOnlyRegistry,
      createWatcher: vi.fn(() => watcher),
      waitForShutdown: () =>
        new Promise<void>((resolve) => {
          shutdown = resolve;
        }),
    };
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints usage and exits 2 on a usage error', async () => {
    const code = await runCli(['convert'], deps);

    expect(code).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith(
      `convert expects 2 argument(s), got 0\n\n${USAGE}`,
    );
  });

  it('prints usage and exits 0 for help', async () => {
    const code = await runCli(['-h'], deps);

    expect(code).toBe(EXIT_OK);
    expect(console.log).toHaveBeenCalledWith(USAGE);
  });

  it('exits 2 when the settings file is invalid', async () => {
    deps = { ...deps, readText: vi.fn().mockResolvedValue('{"outputFormat":"ods"') };

    const code = await runCli(['batch', '/reports', '-c', 'site.json'], deps);

    expect(code).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith('Config file is not valid JSON: site.json');
  });

  describe('convert', () => {
    it('writes csv when the output name ends in .csv', async () => {
      const code = await runCli(['convert', '/reports/july.txt', '/out/july.csv'], deps);

      expect(code).toBe(EXIT_OK);
      expect(fs.readText('/out/july.csv')).toBe(REPORT_CSV);
      expect(console.info).toHaveBeenCalledWith(
        '[Cubesheet:Convert] Converted: july.txt -> /out/july.csv',
      );
    });

    it('writes an xlsx workbook by default', async () => {
      const code = await runCli(['convert', '/reports/july.txt', '/out/july.xlsx'], deps);

      expect(code).toBe(EXIT_OK);
      const bytes = fs.files.get('/out/july.xlsx');
      expect(bytes?.slice(0, 2)).toEqual(new Uint8Array([0x50, 0x4b]));
    });

    it('lets --format win over the output name', async () => {
      await runCli(['convert', '/reports/july.txt', '/out/july.csv', '--format', 'xlsx'], deps);

      expect(fs.files.get('/out/july.csv')?.slice(0, 2)).toEqual(new Uint8Array([0x50, 0x4b]));
    });

    it('logs problems and statistics with --validate', async () => {
      await runCli(['convert', '/reports/july.txt', '/out/july.csv', '--validate'], deps);

      expect(console.info).toHaveBeenCalledWith(
        '[Cubesheet:Validate] july.txt: 0 problem(s) in 2 record(s)',
      );
    });

    it('exits 1 and writes nothing when no records are found', async () => {
      fs.files.set('/reports/cover.txt', new TextEncoder().encode('Cover page only'));

      const code = await runCli(['convert', '/reports/cover.txt', '/out/cover.csv'], deps);

      expect(code).toBe(EXIT_FAILURE);
      expect(fs.files.has('/out/cover.csv')).toBe(false);
      expect(console.error).toHaveBeenCalledWith(
        '[Cubesheet:Convert] No cube records found: cover.txt',
      );
    });

    it('exits 1 for an unsupported input', async () => {
      const code = await runCli(['convert', '/reports/july.docx', '/out/july.csv'], deps);

      expect(code).toBe(EXIT_FAILURE);
      expect(console.error).toHaveBeenCalledWith(
        '[Cubesheet:Convert] Unsupported input: /reports/july.docx (supported: .txt)',
      );
    });

    it('exits 1 when the input cannot be read', async () => {
      const code = await runCli(['convert', '/reports/missing.txt', '/out/m.csv'], deps);

      expect(code).toBe(EXIT_FAILURE);
      expect(console.error).toHaveBeenCalledWith(
        '[Cubesheet:Convert] File read failed: missing.txt',
        expect.any(Error),
      );
    });
  });

  describe('batch', () => {
    it('writes beside the reports and exits 0', async () => {
      const code = await runCli(['batch', '/reports', '--format', 'csv'], deps);

      expect(code).toBe(EXIT_OK);
      expect(fs.readText('/reports/july_processed.csv')).toBe(REPORT_CSV);
    });

    it('writes to the output folder when one is given', async () => {
      await runCli(['batch', '/reports', '--format', 'csv', '-o', '/sheets'], deps);

      expect(fs.files.has('/sheets/july_processed.csv')).toBe(true);
    });

    it('exits 1 when a report has no records', async () => {
      fs.files.set('/reports/cover.txt', new TextEncoder().encode('Cover page only'));

      const code = await runCli(['batch', '/reports'], deps);

      expect(code).toBe(EXIT_FAILURE);
    });
  });

  describe('watch', () => {
    it('converts reported files until shutdown', async () => {
      const run = runCli(['watch', '/reports', '--format', 'csv', '-o', '/out'], deps);
      await vi.waitFor(() => expect(watcher.started).toBe(true));

      await watcher.fileHandler?.(createEvent('july.txt', REPORT_TEXT));
      shutdown();

      expect(await run).toBe(EXIT_OK);
      expect(fs.readText('/out/july_processed.csv')).toBe(REPORT_CSV);
      expect(watcher.stopped).toBe(true);
    });

    it('watches for the registered extensions with the watch settings', async () => {
      const run = runCli(['watch', '/reports'], deps);
      await vi.waitFor(() => expect(watcher.started).toBe(true));
      shutdown();
      await run;

      const expected: ReportFolderWatcherOptions = {
        extensions: ['.txt'],
        ignoreInitial: false,
        stabilityThresholdMs: 500,
      };
      expect(deps.createWatcher).toHaveBeenCalledWith('/reports', expected);
    });

    it('logs a failed conversion and keeps watching', async () => {
      const run = runCli(['watch', '/reports'], deps);
      await vi.waitFor(() => expect(watcher.started).toBe(true));

      await watcher.fileHandler?.(
        createEvent('july.txt', REPORT_TEXT, {
          readData: vi.fn().mockRejectedValue(new Error('gone')),
        }),
      );
      shutdown();

      expect(await run).toBe(EXIT_OK);
      expect(console.error).toHaveBeenCalledWith(
        '[Cubesheet:Convert] Conversion failed: july.txt',
        expect.any(Error),
      );
    });
  });
});
