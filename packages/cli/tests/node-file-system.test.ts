import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileSystemError } from '@cubesheet/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NodeFileSystem } from '../src/node-file-system.js';

describe('NodeFileSystem', () => {
  let root: string;
  const fileSystem = new NodeFileSystem();

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'cubesheet-fs-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates missing folders before writing', async () => {
    const target = path.join(root, 'out', 'nested', 'july.csv');

    await fileSystem.writeFile(target, new TextEncoder().encode('a|b\n'));

    expect(await fs.readFile(target, 'utf8')).toBe('a|b\n');
  });

  it('wraps a failed write in FileSystemError', async () => {
    await fs.writeFile(path.join(root, 'blocker'), 'x');
    const target = path.join(root, 'blocker', 'july.csv');

    await expect(fileSystem.writeFile(target, new Uint8Array())).rejects.toMatchObject({
      name: 'FileSystemError',
      operation: 'mkdir',
      path: path.join(root, 'blocker'),
    });
  });

  it('lists only the regular files of a folder', async () => {
    await fs.writeFile(path.join(root, 'a.pdf'), 'x');
    await fs.writeFile(path.join(root, 'b.txt'), 'y');
    await fs.mkdir(path.join(root, 'archive'));

    const names = await fileSystem.listFiles(root);

    expect(names.sort()).toEqual(['a.pdf', 'b.txt']);
  });

  it('reads a file into an ArrayBuffer of the same bytes', async () => {
    await fs.writeFile(path.join(root, 'a.txt'), 'cube');

    const data = await fileSystem.readFile(path.join(root, 'a.txt'));

    expect(new TextDecoder().decode(data)).toBe('cube');
  });

  it('wraps a failed read in FileSystemError', async () => {
    const missing = path.join(root, 'missing.pdf');

    const error = await fileSystem.readFile(missing).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileSystemError);
    expect(error).toMatchObject({ operation: 'read', path: missing });
  });

  it('wraps a failed listing in FileSystemError', async () => {
    const missing = path.join(root, 'nowhere');

    await expect(fileSystem.listFiles(missing)).rejects.toMatchObject({
      name: 'FileSystemError',
      operation: 'list',
      path: missing,
    });
  });
});
