import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { TextDecoder } from 'node:util';

import { LexiconError } from './errors';
import { isDirectory, isFile } from './files';
import { type Logger, createLogger } from './logger';
import type { LexiconFile, LexiconSummary } from './types';

export const REQUIRED_DEFINITIONS = ['matrix.def', 'char.def', 'unk.def'];

// Java charset names BuildDic takes that are not WHATWG encoding labels.
const JAVA_CHARSETS: Record<string, string> = {
  ISO2022JP: 'iso-2022-jp',
  MS932: 'shift_jis',
  SJIS: 'shift_jis',
  EUCJIS: 'euc-jp'
};

const tryDecoder = (label: string): TextDecoder | null => {
  try {
    return new TextDecoder(label);
  } catch (error) {
    if (error instanceof RangeError) {
      return null;
    }
    throw error;
  }
};

export const resolveDecoder = (encoding: string): TextDecoder | null => {
  const candidates = [encoding, encoding.replace(/_/g, '-'), JAVA_CHARSETS[encoding.toUpperCase()]];
  for (const candidate of candidates) {
    const decoder = candidate ? tryDecoder(candidate) : null;
    if (decoder) {
      return decoder;
    }
  }
  return null;
};

export const countEntries = (text: string): number =>
  text.split(/\r?\n/).filter((line) => line.trim().length > 0).length;

export const inspectLexicon = async (
  directory: string,
  encoding: string,
  logger: Logger = createLogger('dictionary:build')
): Promise<LexiconSummary> => {
  if (!(await isDirectory(directory))) {
    throw new LexiconError(directory, `Lexicon directory not found: ${directory}`);
  }

  let decoder = resolveDecoder(encoding);
  if (!decoder) {
    logger.warn(`No decoder for encoding "${encoding}"; counting lexicon lines byte-wise.`);
    decoder = new TextDecoder('latin1');
  }

  const missing: string[] = [];
  for (const name of REQUIRED_DEFINITIONS) {
    if (!(await isFile(join(directory, name)))) {
      missing.push(name);
    }
  }
  if (missing.length) {
    throw new LexiconError(directory, `Lexicon directory ${directory} is missing ${missing.join(', ')}.`);
  }

  const dirents = await readdir(directory, { withFileTypes: true });
  const names = dirents
    .filter((dirent) => dirent.isFile() && extname(dirent.name).toLowerCase() === '.csv')
    .map((dirent) => dirent.name)
    .sort();
  if (!names.length) {
    throw new LexiconError(directory, `No lexicon (.csv) files in ${directory}.`);
  }

  const files: LexiconFile[] = [];
  for (const name of names) {
    const data = await readFile(join(directory, name));
    files.push({ name, entries: countEntries(decoder.decode(data)) });
  }

  return {
    directory,
    encoding,
    decodedAs: decoder.encoding,
    files,
    entries: files.reduce((total, file) => total + file.entries, 0)
  };
};
