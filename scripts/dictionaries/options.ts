import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ConfigError } from './errors';
import type { PackageOptions } from './types';

export const DEFAULT_ROOT = fileURLToPath(new URL('../../ipadic/', import.meta.url));
export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000; // 10 minutes
// Longest delay setTimeout honours; larger values fire immediately.
export const MAX_TIMEOUT_MS = 2_147_483_647;

const DEFAULTS = {
  jar: 'igo-0.4.5.jar',
  source: 'mecab/mecab-ipadic',
  output: 'ipadic',
  archive: 'ipadic.zip',
  encoding: 'EUC-JP'
};

type ValueFlag = 'root' | 'jar' | 'source' | 'output' | 'archive' | 'encoding' | 'java' | 'timeout';

const VALUE_FLAGS: ValueFlag[] = ['root', 'jar', 'source', 'output', 'archive', 'encoding', 'java', 'timeout'];

const parseTimeout = (raw: string, origin: string): number => {
  const value = Number(raw);
  if (!raw.trim() || !Number.isInteger(value) || value <= 0 || value > MAX_TIMEOUT_MS) {
    throw new ConfigError(
      `Invalid timeout from ${origin}: "${raw}". Expected a positive number of milliseconds up to ${MAX_TIMEOUT_MS}.`
    );
  }
  return value;
};

const contains = (parent: string, child: string): boolean => {
  const path = relative(parent, child);
  return path === '' || (path.split(sep)[0] !== '..' && !isAbsolute(path));
};

// The output directory is removed recursively around every build.
export const assertSafeOutput = (options: Pick<PackageOptions, 'root' | 'output' | 'source' | 'jar' | 'archive'>): void => {
  if (contains(options.output, options.root)) {
    throw new ConfigError(`Output directory ${options.output} must not contain the root ${options.root}.`);
  }
  const inputs: [string, string][] = [
    ['lexicon', options.source],
    ['jar', options.jar],
    ['archive', options.archive]
  ];
  for (const [label, path] of inputs) {
    if (contains(options.output, path)) {
      throw new ConfigError(`Output directory ${options.output} must not contain the ${label} ${path}.`);
    }
  }
};

export const parseArgs = (
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): PackageOptions => {
  const values: Partial<Record<ValueFlag, string>> = {};
  let keepOutput = false;
  let dryRun = false;

  argv.forEach((arg) => {
    if (arg === '--keep-output') {
      keepOutput = true;
      return;
    }
    if (arg === '--dry-run') {
      dryRun = true;
      return;
    }
    const flag = VALUE_FLAGS.find((name) => arg.startsWith(`--${name}=`));
    if (!flag) {
      throw new ConfigError(`Unknown argument "${arg}".`);
    }
    const value = arg.substring(`--${flag}=`.length).trim();
    if (!value) {
      throw new ConfigError(`Missing value for --${flag}.`);
    }
    values[flag] = value;
  });

  const root = resolve(values.root ?? env.IPADIC_ROOT ?? DEFAULT_ROOT);
  const javaHome = env.JAVA_HOME?.trim();

  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (values.timeout !== undefined) {
    timeoutMs = parseTimeout(values.timeout, '--timeout');
  } else if (env.BUILD_TIMEOUT_MS !== undefined) {
    timeoutMs = parseTimeout(env.BUILD_TIMEOUT_MS, 'BUILD_TIMEOUT_MS');
  }

  const options: PackageOptions = {
    root,
    jar: resolve(root, values.jar ?? env.IGO_JAR ?? DEFAULTS.jar),
    source: resolve(root, values.source ?? DEFAULTS.source),
    output: resolve(root, values.output ?? DEFAULTS.output),
    archive: resolve(root, values.archive ?? DEFAULTS.archive),
    encoding: values.encoding ?? DEFAULTS.encoding,
    java: values.java ?? (javaHome ? join(javaHome, 'bin', 'java') : 'java'),
    timeoutMs,
    keepOutput,
    dryRun
  };
  assertSafeOutput(options);
  return options;
};

export interface UnpackOptions {
  archive: string;
  target?: string;
}

export const parseUnpackArgs = (
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): UnpackOptions => {
  const root = resolve(env.IPADIC_ROOT ?? DEFAULT_ROOT);
  let archive = resolve(root, DEFAULTS.archive);
  let target: string | undefined;

  argv.forEach((arg) => {
    const flag = ['archive', 'target'].find((name) => arg.startsWith(`--${name}=`));
    if (!flag) {
      throw new ConfigError(`Unknown argument "${arg}".`);
    }
    const value = arg.substring(`--${flag}=`.length).trim();
    if (!value) {
      throw new ConfigError(`Missing value for --${flag}.`);
    }
    if (flag === 'archive') {
      archive = resolve(root, value);
      return;
    }
    target = resolve(root, value);
  });

  return { archive, target };
};
