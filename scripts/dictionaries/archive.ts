import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, posix } from 'node:path';

import AdmZip from 'adm-zip';

import { ArchiveError, errorMessage } from './errors';
import type { ArchiveEntry } from './types';

const openArchive = (archivePath: string): AdmZip => {
  try {
    return new AdmZip(archivePath);
  } catch (error) {
    throw new ArchiveError(`Cannot read archive ${archivePath}: ${errorMessage(error)}`, { cause: error });
  }
};

export const createArchive = async (directory: string, archivePath: string): Promise<ArchiveEntry[]> => {
  const zip = new AdmZip();
  zip.addLocalFolder(directory, basename(directory));

  const entries = listEntries(zip);
  if (!entries.length) {
    throw new ArchiveError(`Nothing to archive: ${directory} contains no files.`);
  }

  // Renamed into place once fully written.
  const partialPath = `${archivePath}.partial`;
  try {
    await mkdir(dirname(archivePath), { recursive: true });
    await writeFile(partialPath, zip.toBuffer());
    await rename(partialPath, archivePath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw new ArchiveError(`Failed to write archive ${archivePath}: ${errorMessage(error)}`, { cause: error });
  }
  return entries;
};

export const listArchive = (archivePath: string): ArchiveEntry[] => listEntries(openArchive(archivePath));

export const extractFlat = async (archivePath: string, targetDir: string): Promise<string[]> => {
  const zip = openArchive(archivePath);
  await mkdir(targetDir, { recursive: true });

  const written: string[] = [];
  for (const entry of zip.getEntries()) {
    if (entry.isDirectory) {
      continue;
    }
    const name = posix.basename(entry.entryName);
    await writeFile(join(targetDir, name), entry.getData());
    written.push(name);
  }
  return written;
};

const listEntries = (zip: AdmZip): ArchiveEntry[] =>
  zip
    .getEntries()
    .filter((entry) => !entry.isDirectory)
    .map((entry) => ({ name: entry.entryName, size: entry.header.size }));
