import { BuildError } from './errors';
import { isFile } from './files';
import { runProcess } from './process';
import type { Invocation, PackageOptions } from './types';

export const BUILD_DIC_CLASS = 'net.reduls.igo.bin.BuildDic';

// Files the Igo builder writes into the output directory.
export const DICTIONARY_FILES = [
  'word2id',
  'word.dat',
  'word.ary.idx',
  'word.inf',
  'matrix.bin',
  'char.category',
  'code2category'
];

export const createBuildDicInvocation = (options: PackageOptions): Invocation => ({
  command: options.java,
  args: ['-cp', options.jar, BUILD_DIC_CLASS, options.output, options.source, options.encoding]
});

export const formatInvocation = ({ command, args }: Invocation): string =>
  [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ');

export const igoBuilder = async (options: PackageOptions): Promise<void> => {
  if (!(await isFile(options.jar))) {
    throw new BuildError(`Igo jar not found: ${options.jar}. Download it from https://osdn.net/projects/igo/.`);
  }
  const { command, args } = createBuildDicInvocation(options);
  await runProcess(command, args, { cwd: options.root, timeoutMs: options.timeoutMs });
};
