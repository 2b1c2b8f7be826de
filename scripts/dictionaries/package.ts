import { mkdtemp, readdir, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join, relative } from 'node:path';

import { createArchive, extractFlat } from './archive';
import { ArchiveError, BuildError } from './errors';
import { checksum, isDirectory, isFile, removeIfExists } from './files';
import { DICTIONARY_FILES, createBuildDicInvocation, formatInvocation, igoBuilder } from './igo';
import { inspectLexicon } from './lexicon';
import { assertSafeOutput } from './options';
import { type Logger, createLogger } from './logger';
import type { ArchiveEntry, DictionaryBuilder, Manifest, PackageOptions, PackageResult } from './types';

export interface PackageDependencies {
  builder?: DictionaryBuilder;
  logger?: Logger;
  now?: () => Date;
}

export const manifestPathFor = (archivePath: string): string => `${archivePath}.manifest.json`;

const verifyOutput = async (output: string, logger: Logger): Promise<void> => {
  if (!(await isDirectory(output))) {
    throw new BuildError(`Builder finished without producing ${output}.`);
  }
  const names = (await readdir(output, { withFileTypes: true }))
    .filter((dirent) => dirent.isFile())
    .map((dirent) => dirent.name);
  if (!names.length) {
    throw new BuildError(`Builder produced an empty directory: ${output}.`);
  }
  const missing = DICTIONARY_FILES.filter((name) => !names.includes(name));
  if (missing.length) {
    logger.warn(`Dictionary output is missing ${missing.join(', ')}.`);
  }
};

export const packageDictionary = async (
  options: PackageOptions,
  dependencies: PackageDependencies = {}
): Promise<PackageResult | null> => {
  const builder = dependencies.builder ?? igoBuilder;
  const logger = dependencies.logger ?? createLogger('dictionary:build');
  const now = dependencies.now ?? (() => new Date());

  assertSafeOutput(options);
  const lexicon = await inspectLexicon(options.source, options.encoding, logger);
  logger.info(`Lexicon ${options.source}: ${lexicon.files.length} files, ${lexicon.entries} entries (${lexicon.encoding}).`);

  if (options.dryRun) {
    logger.info(`Dry run: ${formatInvocation(createBuildDicInvocation(options))}`);
    return null;
  }

  const manifestPath = manifestPathFor(options.archive);
  if (await removeIfExists(options.archive)) {
    logger.info(`Removed stale archive ${options.archive}`);
  }
  await removeIfExists(manifestPath);
  if (await removeIfExists(options.output)) {
    logger.warn(`Removed leftover output directory ${options.output}`);
  }

  logger.info(`Building dictionary into ${options.output}...`);
  let entries: ArchiveEntry[];
  try {
    await builder(options);
    await verifyOutput(options.output, logger);
    entries = await createArchive(options.output, options.archive);
  } catch (error) {
    if (!options.keepOutput) {
      await removeIfExists(options.output);
    }
    throw error;
  }
  logger.info(`Archived ${entries.length} files into ${options.archive}`);

  if (!options.keepOutput) {
    await removeIfExists(options.output);
  }

  const manifest: Manifest = {
    generatedAt: now().toISOString(),
    encoding: options.encoding,
    source: relative(options.root, options.source),
    lexiconEntries: lexicon.entries,
    archive: basename(options.archive),
    archiveSha256: await checksum(options.archive),
    archiveSize: (await stat(options.archive)).size,
    entries
  };

  await writeFile(manifestPath, JSON.stringify(manifest, null, 2), 'utf-8');
  logger.info(`Manifest written to ${manifestPath}`);

  return { archivePath: options.archive, manifestPath, manifest };
};

export interface UnpackResult {
  targetDir: string;
  files: string[];
  missing: string[];
}

export const unpackDictionary = async (
  archivePath: string,
  targetDir?: string,
  logger: Logger = createLogger('dictionary:unpack')
): Promise<UnpackResult> => {
  if (!(await isFile(archivePath))) {
    throw new ArchiveError(`Archive not found: ${archivePath}`);
  }
  const target = targetDir ?? (await mkdtemp(join(tmpdir(), 'ipadic-')));
  const files = await extractFlat(archivePath, target);
  const missing = DICTIONARY_FILES.filter((name) => !files.includes(name));
  if (missing.length) {
    logger.warn(`Archive ${archivePath} is missing ${missing.join(', ')}.`);
  }
  logger.info(`Extracted ${files.length} files into ${target}`);
  return { targetDir: target, files, missing };
};
