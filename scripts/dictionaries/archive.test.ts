import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createArchive, extractFlat, listArchive } from './archive';
import { ArchiveError } from './errors';

describe('archive', () => {
  let workDir: string;
  let dictionaryDir: string;
  let archivePath: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'archive-test-'));
    dictionaryDir = join(workDir, 'ipadic');
    archivePath = join(workDir, 'ipadic.zip');
    await mkdir(join(dictionaryDir, 'sub'), { recursive: true });
    await writeFile(join(dictionaryDir, 'a.txt'), 'alpha');
    await writeFile(join(dictionaryDir, 'sub', 'b.txt'), 'beta');
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('archives the directory under its own name', async () => {
    const entries = await createArchive(dictionaryDir, archivePath);
    const byName = (left: { name: string }, right: { name: string }) => left.name.localeCompare(right.name);

    expect([...entries].sort(byName)).toEqual([
      { name: 'ipadic/a.txt', size: 5 },
      { name: 'ipadic/sub/b.txt', size: 4 }
    ]);
    expect(listArchive(archivePath).sort(byName)).toEqual([
      { name: 'ipadic/a.txt', size: 5 },
      { name: 'ipadic/sub/b.txt', size: 4 }
    ]);
    expect(existsSync(`${archivePath}.partial`)).toBe(false);
  });

  it('refuses to archive an empty directory', async () => {
    const emptyDir = join(workDir, 'empty');
    await mkdir(emptyDir);

    await expect(createArchive(emptyDir, archivePath)).rejects.toThrow(ArchiveError);
    await expect(createArchive(emptyDir, archivePath)).rejects.toThrow(`Nothing to archive: ${emptyDir} contains no files.`);
    expect(existsSync(archivePath)).toBe(false);
  });

  it('extracts every file flat into the target', async () => {
    await createArchive(dictionaryDir, archivePath);
    const target = join(workDir, 'extracted');

    const written = await extractFlat(archivePath, target);

    expect([...written].sort()).toEqual(['a.txt', 'b.txt']);
    expect(await readFile(join(target, 'a.txt'), 'utf-8')).toBe('alpha');
    expect(await readFile(join(target, 'b.txt'), 'utf-8')).toBe('beta');
    expect(existsSync(join(target, 'sub'))).toBe(false);
  });

  it('reports unreadable archives', () => {
    const missing = join(workDir, 'missing.zip');
    expect(() => listArchive(missing)).toThrow(`Cannot read archive ${missing}`);
  });
});
