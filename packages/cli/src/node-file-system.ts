import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { FileSystemPort } from '@cubesheet/core';
import { FileSystemError } from '@cubesheet/core';

/** What batch mode needs to find and read reports in a folder. */
export interface ReportFileSystem {
  listFiles(dirPath: string): Promise<string[]>;
  readFile(filePath: string): Promise<ArrayBuffer>;
}

export class NodeFileSystem implements FileSystemPort, ReportFileSystem {
  async writeFile(filePath: string, data: Uint8Array): Promise<void> {
    const dir = path.dirname(filePath);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new FileSystemError('mkdir', dir, error);
    }

    try {
      await fs.writeFile(filePath, data);
    } catch (error) {
      throw new FileSystemError('write', filePath, error);
    }
  }

  /** Names of the regular files directly inside `dirPath`. */
  async listFiles(dirPath: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch (error) {
      throw new FileSystemError('list', dirPath, error);
    }
  }

  async readFile(filePath: string): Promise<ArrayBuffer> {
    let buf: Buffer;
    try {
      buf = await fs.readFile(filePath);
    } catch (error) {
      throw new FileSystemError('read', filePath, error);
    }
    const ab = new ArrayBuffer(buf.byteLength);
    new Uint8Array(ab).set(buf);
    return ab;
  }
}
