import * as path from 'node:path';
import { parseArgs } from 'node:util';
import type { FileSystemPort, WatcherPort } from '@cubesheet/core';
import type { ReportFolderWatcherOptions } from '@cubesheet/watcher-chokidar';
import { ReportFolderWatcher } from '@cubesheet/watcher-chokidar';
import { BatchRunner } from './batch-runner.js';
import { logConversionResult } from './conversion-report.js';
import { saveConversionResult, writeConversionOutput } from './conversion-saver.js';
import { formatConversionError } from './format-conversion-error.js';
import { createLogger } from './logger.js';
import { MemoryConversionState } from './memory-conversion-state.js';
import type { ReportFileSystem } from './node-file-system.js';
import { NodeFileSystem } from './node-file-system.js';
import type { PageSourceRegistry } from './page-source-registry.js';
import { createPageSourceRegistry, createPipeline } from './pipeline-factory.js';
import { processReport } from './process-report.js';
import type { ProcessReportContext } from './process-report.js';
import type { CubesheetSettings, OutputFormat, ReadTextFn } from './settings.js';
import { loadSettings, readTextFile, SettingsError } from './settings.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage:
  cubesheet convert <input> <output> [options]
  cubesheet batch <folder> [options]
  cubesheet watch <folder> [options]

Options:
  --validate               Check records and log problems and per-type statistics
  --format <xlsx|csv>      Output format (default: from the output name or config, else xlsx)
  --include-unrecognized   Add a sheet for marks of unknown specimen type
  -o, --output-dir <dir>   Output folder for batch and watch (default: the input folder)
  -c, --config <file>      Settings file (default: ./cubesheet.config.json when present)
  -h, --help               Show this help`;

type Command = 'convert' | 'batch' | 'watch';

const COMMAND_ARITY: Readonly<Record<Command, number>> = {
  convert: 2,
  batch: 1,
  watch: 1,
};

const OPTIONS = {
  validate: { type: 'boolean' },
  format: { type: 'string' },
  'include-unrecognized': { type: 'boolean' },
  'output-dir': { type: 'string', short: 'o' },
  config: { type: 'string', short: 'c' },
  help: { type: 'boolean', short: 'h' },
} as const;

export interface CliArgs {
  readonly command: Command | null;
  readonly positionals: readonly string[];
  readonly validate: boolean | undefined;
  readonly format: OutputFormat | undefined;
  readonly includeUnrecognized: boolean | undefined;
  readonly outputDir: string | undefined;
  readonly config: string | undefined;
  readonly help: boolean;
}

export interface CliDependencies {
  readonly fileSystem: FileSystemPort & ReportFileSystem;
  readonly readText: ReadTextFn;
  readonly createRegistry: () => PageSourceRegistry;
  readonly createWatcher: (dir: string, options: ReportFolderWatcherOptions) => WatcherPort;
  readonly waitForShutdown: () => Promise<void>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function defaultDependencies(): CliDependencies {
  return {
    fileSystem: new NodeFileSystem(),
    readText: readTextFile,
    createRegistry: createPageSourceRegistry,
    createWatcher: (dir, options) => new ReportFolderWatcher(dir, options),
    waitForShutdown: () =>
      new Promise<void>((resolve) => {
        process.once('SIGINT', () => resolve());
        process.once('SIGTERM', () => resolve());
      }),
  };
}

function isCommand(value: string): value is Command {
  return value === 'convert' || value === 'batch' || value === 'watch';
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'xlsx' || value === 'csv';
}

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parseRawArgs(argv);
  const help = values.help ?? false;
  const [name, ...rest] = positionals;

  let command: Command | null = null;
  if (name !== undefined) {
    if (!isCommand(name)) throw new UsageError(`Unknown command: ${name}`);
    command = name;
  } else if (!help) {
    throw new UsageError('Missing command');
  }

  if (command && !help && rest.length !== COMMAND_ARITY[command]) {
    throw new UsageError(
      `${command} expects ${COMMAND_ARITY[command]} argument(s), got ${rest.length}`,
    );
  }

  const format = values.format;
  if (format !== undefined && !isOutputFormat(format)) {
    throw new UsageError(`Unknown format: ${format} (expected xlsx or csv)`);
  }

  return {
    command,
    positionals: rest,
    validate: values.validate,
    format,
    includeUnrecognized: values['include-unrecognized'],
    outputDir: values['output-dir'],
    config: values.config,
    help,
  };
}

/** Command-line flags win over the settings file. */
export function applyOverrides(settings: CubesheetSettings, args: CliArgs): CubesheetSettings {
  return {
    ...settings,
    outputFormat: args.format ?? settings.outputFormat,
    validate: args.validate ?? settings.validate,
    layout: {
      ...settings.layout,
      includeUnrecognized: args.includeUnrecognized ?? settings.layout.includeUnrecognized,
    },
  };
}

export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = defaultDependencies(),
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`${error.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (args.help || args.command === null) {
    console.log(USAGE);
    return EXIT_OK;
  }

  let settings: CubesheetSettings;
  try {
    settings = applyOverrides(await loadSettings(args.config, deps.readText), args);
  } catch (error) {
    if (!(error instanceof SettingsError)) throw error;
    console.error(error.message);
    return EXIT_USAGE;
  }

  const [first, second] = args.positionals;
  switch (args.command) {
    case 'convert':
      return runConvert(first, second, args, settings, deps);
    case 'batch':
      return runBatch(first, args.outputDir ?? first, settings, deps);
    case 'watch':
      return runWatch(first, args.outputDir ?? first, settings, deps);
  }
}

async function runConvert(
  input: string,
  output: string,
  args: CliArgs,
  settings: CubesheetSettings,
  deps: CliDependencies,
): Promise<number> {
  const convertLog = createLogger('Convert');
  const validateLog = createLogger('Validate');

  const registry = deps.createRegistry();
  const source = registry.getSourceForExtension(path.extname(input));
  if (!source) {
    convertLog.error(
      `Unsupported input: ${input} (supported: ${registry.getSupportedExtensions().join(', ')})`,
    );
    return EXIT_FAILURE;
  }

  const inferCsv = args.format === undefined && path.extname(output).toLowerCase() === '.csv';
  const effective: CubesheetSettings = inferCsv ? { ...settings, outputFormat: 'csv' } : settings;
  const pipeline = createPipeline(registry, effective, new MemoryConversionState());
  const inputName = path.basename(input);

  try {
    const data = await deps.fileSystem.readFile(input);
    const outputName = path.basename(output, path.extname(output));
    const result = await pipeline.convertData(data, source, outputName);
    logConversionResult(inputName, result, convertLog, validateLog);

    if (result.extraction.records.length === 0) {
      convertLog.error(`No cube records found: ${inputName}`);
      return EXIT_FAILURE;
    }

    await writeConversionOutput(result, output, deps.fileSystem);
    convertLog.info(`Converted: ${inputName} -> ${output}`);
    return EXIT_OK;
  } catch (error) {
    convertLog.error(formatConversionError(inputName, error), error);
    return EXIT_FAILURE;
  }
}

async function runBatch(
  folder: string,
  outputDir: string,
  settings: CubesheetSettings,
  deps: CliDependencies,
): Promise<number> {
  const pipeline = createPipeline(deps.createRegistry(), settings, new MemoryConversionState());
  const runner = new BatchRunner(
    pipeline,
    deps.fileSystem,
    (result, dir, baseName) => saveConversionResult(result, dir, baseName, deps.fileSystem),
    createLogger('Batch'),
    createLogger('Convert'),
    createLogger('Validate'),
    { outputSuffix: settings.batch.outputSuffix },
  );

  const result = await runner.run(folder, outputDir);
  return result.failed + result.empty > 0 ? EXIT_FAILURE : EXIT_OK;
}

async function runWatch(
  folder: string,
  outputDir: string,
  settings: CubesheetSettings,
  deps: CliDependencies,
): Promise<number> {
  const watchLog = createLogger('Watch');
  const convertLog = createLogger('Convert');
  const registry = deps.createRegistry();
  const conversionState = new MemoryConversionState();
  const pipeline = createPipeline(registry, settings, conversionState);

  const watcher = deps.createWatcher(folder, {
    extensions: registry.getSupportedExtensions(),
    ignoreInitial: settings.watch.ignoreInitial,
    stabilityThresholdMs: settings.watch.stabilityThresholdMs,
  });

  const context: ProcessReportContext = {
    pipeline,
    conversionState,
    save: (result, dir, baseName) => saveConversionResult(result, dir, baseName, deps.fileSystem),
    outputDir,
    outputSuffix: settings.batch.outputSuffix,
    convertLog,
    validateLog: createLogger('Validate'),
  };

  watcher.onFileChange(async (event) => {
    try {
      await processReport(event, context);
    } catch (error) {
      convertLog.error(formatConversionError(event.name, error), error);
    }
  });
  watcher.onError((error) => {
    watchLog.error('Watcher error', error);
  });

  await watcher.start();
  watchLog.info(`Watching ${folder} -> ${outputDir}`);

  await deps.waitForShutdown();
  await watcher.stop();
  watchLog.info('Stopped');
  return EXIT_OK;
}
