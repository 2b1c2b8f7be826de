#!/usr/bin/env tsx
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { parseUnpackArgs } from './options';
import { unpackDictionary } from './package';

const logger = createLogger('dictionary:unpack');

const unpack = async (): Promise<void> => {
  const options = parseUnpackArgs();
  const result = await unpackDictionary(options.archive, options.target, logger);
  if (result.missing.length) {
    process.exitCode = 1;
  }
};

unpack().catch((error: unknown) => {
  logger.error(`Failed to unpack dictionary: ${errorMessage(error)}`);
  process.exitCode = 1;
});
