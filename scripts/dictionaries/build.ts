#!/usr/bin/env tsx
import { PackageError, errorMessage } from './errors';
import { createLogger } from './logger';
import { parseArgs } from './options';
import { packageDictionary } from './package';

const logger = createLogger('dictionary:build');

const build = async (): Promise<void> => {
  const options = parseArgs();
  const result = await packageDictionary(options, { logger });
  if (!result) {
    return;
  }
  const { manifest } = result;
  logger.info(`Packaged ${manifest.entries.length} dictionary files (${manifest.archiveSize} bytes, sha256 ${manifest.archiveSha256}).`);
};

build().catch((error: unknown) => {
  const step = error instanceof PackageError ? ` (${error.step})` : '';
  logger.error(`Dictionary packaging failed${step}: ${errorMessage(error)}`);
  process.exitCode = 1;
});
