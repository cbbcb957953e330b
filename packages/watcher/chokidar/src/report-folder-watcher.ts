import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { FileChangeEvent, WatcherPort } from '@cubesheet/core';
import type { FSWatcher } from 'chokidar';
import { watch } from 'chokidar';

export interface ReportFolderWatcherOptions {
  /** Lower-case extensions to report; other files are ignored */
  readonly extensions: readonly string[];
  /** Skip reports already in the folder when watching starts */
  readonly ignoreInitial: boolean;
  /** How long a file's size must hold still before it is reported, in ms; 0 reports at once */
  readonly stabilityThresholdMs: number;
}

export const DEFAULT_REPORT_FOLDER_WATCHER_OPTIONS: ReportFolderWatcherOptions = {
  extensions: ['.pdf'],
  ignoreInitial: false,
  stabilityThresholdMs: 500,
};

function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function toArrayBuffer(buf: Uint8Array): ArrayBuffer {
  const ab = new ArrayBuffer(buf.byteLength);
  new Uint8Array(ab).set(buf);
  return ab;
}

/** Reports new and rewritten report files in one folder, without descending into subfolders. */
export class ReportFolderWatcher implements WatcherPort {
  private watcher: FSWatcher | null = null;
  private fileHandler: ((event: FileChangeEvent) => Promise<void>) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;

  constructor(
    private readonly dir: string,
    private readonly options: ReportFolderWatcherOptions = DEFAULT_REPORT_FOLDER_WATCHER_OPTIONS,
  ) {}

  onFileChange(handler: (event: FileChangeEvent) => Promise<void>): void {
    this.fileHandler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  start(): Promise<void> {
    const threshold = this.options.stabilityThresholdMs;
    this.watcher = watch(this.dir, {
      persistent: true,
      ignoreInitial: this.options.ignoreInitial,
      alwaysStat: true,
      depth: 0,
      awaitWriteFinish:
        threshold > 0
          ? { stabilityThreshold: threshold, pollInterval: Math.min(100, threshold) }
          : false,
    });

    const reportHandler = (filePath: string, stats?: { mtimeMs: number }): void => {
      void this.handleReport(filePath, stats);
    };
    this.watcher.on('add', reportHandler);
    this.watcher.on('change', reportHandler);
    this.watcher.on('error', (error: unknown) => {
      this.errorHandler?.(normalizeError(error));
    });

    return Promise.resolve();
  }

  async stop(): Promise<void> {
    await this.watcher?.close();
    this.watcher = null;
  }

  private async handleReport(
    filePath: string,
    stats: { mtimeMs: number } | undefined,
  ): Promise<void> {
    const extension = path.extname(filePath).toLowerCase();
    if (!this.options.extensions.includes(extension)) return;

    const event: FileChangeEvent = {
      id: filePath,
      name: path.basename(filePath),
      extension,
      mtime: stats?.mtimeMs ?? Date.now(),
      readData: () => fs.readFile(filePath).then(toArrayBuffer),
    };

    try {
      await this.fileHandler?.(event);
    } catch (error) {
      this.errorHandler?.(normalizeError(error));
    }
  }
}
