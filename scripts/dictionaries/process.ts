import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

import { ProcessError } from './errors';
import { createLogger } from './logger';
import type { ProcessResult } from './types';

export type OutputStream = 'stdout' | 'stderr';

export interface RunProcessOptions {
  timeoutMs: number;
  killGraceMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  onOutput?: (line: string, stream: OutputStream) => void;
}

const KILL_GRACE_MS = 5000;

const logger = createLogger('dictionary:build');

const defaultOutput = (line: string, stream: OutputStream): void => {
  if (stream === 'stderr') {
    logger.warn(line);
    return;
  }
  logger.info(line);
};

export const runProcess = (command: string, args: string[], options: RunProcessOptions): Promise<ProcessResult> =>
  new Promise<ProcessResult>((resolve, reject) => {
    const startedAt = Date.now();
    const onOutput = options.onOutput ?? defaultOutput;

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    createInterface({ input: child.stdout }).on('line', (line) => onOutput(line, 'stdout'));
    createInterface({ input: child.stderr }).on('line', (line) => onOutput(line, 'stderr'));

    let settled = false;
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    const killChild = (signal: NodeJS.Signals = 'SIGTERM') => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    };

    const forwardInterrupt = () => killChild('SIGINT');
    const forwardTerminate = () => killChild('SIGTERM');

    const timeoutId = setTimeout(() => {
      timedOut = true;
      killChild('SIGTERM');
      killTimer = setTimeout(() => killChild('SIGKILL'), options.killGraceMs ?? KILL_GRACE_MS);
    }, options.timeoutMs);

    const finish = (error: ProcessError | null, code = 0) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeoutId);
      if (killTimer) {
        clearTimeout(killTimer);
      }
      process.off('SIGINT', forwardInterrupt);
      process.off('SIGTERM', forwardTerminate);
      if (error) {
        reject(error);
        return;
      }
      resolve({ code, durationMs: Date.now() - startedAt });
    };

    process.on('SIGINT', forwardInterrupt);
    process.on('SIGTERM', forwardTerminate);

    child.on('error', (error) => {
      finish(new ProcessError(command, `Failed to start ${command}: ${error.message}`, { cause: error }));
    });

    child.on('close', (code, signal) => {
      if (timedOut) {
        finish(new ProcessError(command, `${command} exceeded ${options.timeoutMs}ms and was terminated.`, { code, signal }));
        return;
      }
      if (signal) {
        finish(new ProcessError(command, `${command} was killed by ${signal}.`, { code, signal }));
        return;
      }
      if (code !== 0) {
        finish(new ProcessError(command, `${command} exited with code ${code}.`, { code }));
        return;
      }
      finish(null, code);
    });
  });
