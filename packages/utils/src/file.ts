/**
 * File Operations
 */

import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { isErrnoException } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Write a file, ensuring the directory exists
 */
export async function safeWriteFile(filePath: string, content: string): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

/**
 * Read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Whether the path names an existing regular file
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    const code = isErrnoException(error) ? error.code : undefined;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

/**
 * Process-scoped scratch directory.
 *
 * Removed by `dispose()`, and synchronously on process exit if the
 * caller never got that far.
 */
export class TempWorkspace {
  private disposed = false;
  private readonly onExit = (): void => {
    this.disposeSync();
  };

  private constructor(public readonly path: string) {
    process.once('exit', this.onExit);
  }

  static async create(prefix = 'termplay-'): Promise<TempWorkspace> {
    const path = await mkdtemp(join(tmpdir(), prefix));
    return new TempWorkspace(path);
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    process.removeListener('exit', this.onExit);
    await rm(this.path, { recursive: true, force: true });
  }

  disposeSync(): void {
    if (this.disposed) return;
    this.disposed = true;
    process.removeListener('exit', this.onExit);
    rmSync(this.path, { recursive: true, force: true });
  }
}
