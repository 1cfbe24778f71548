import { existsSync } from 'node:fs';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isRegularFile, safeReadFile, safeWriteFile, TempWorkspace } from './file.js';

describe('file helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'termplay-file-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports regular files only', async () => {
    const file = join(dir, 'clip.mp4');
    await writeFile(file, 'data');
    await mkdir(join(dir, 'folder'));

    expect(await isRegularFile(file)).toBe(true);
    expect(await isRegularFile(join(dir, 'folder'))).toBe(false);
    expect(await isRegularFile(join(dir, 'missing.mp4'))).toBe(false);
  });

  it('returns null when reading a missing file', async () => {
    expect(await safeReadFile(join(dir, 'nope.json'))).toBeNull();
  });

  it('creates parent directories when writing', async () => {
    const target = join(dir, 'nested', 'deeper', 'out.txt');
    await safeWriteFile(target, 'hello');
    expect(await safeReadFile(target)).toBe('hello');
  });
});

describe('TempWorkspace', () => {
  it('creates a directory and removes it on dispose', async () => {
    const workspace = await TempWorkspace.create('termplay-test-');
    expect(existsSync(workspace.path)).toBe(true);

    await workspace.dispose();
    expect(existsSync(workspace.path)).toBe(false);
  });

  it('tolerates being disposed twice', async () => {
    const workspace = await TempWorkspace.create('termplay-test-');
    workspace.disposeSync();
    await workspace.dispose();
    expect(existsSync(workspace.path)).toBe(false);
  });
});
