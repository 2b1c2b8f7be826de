import type { BuildStep } from './types';

export class PackageError extends Error {
  readonly step: BuildStep;

  constructor(step: BuildStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.step = step;
  }
}

export class ConfigError extends PackageError {
  constructor(message: string) {
    super('config', message);
  }
}

export class LexiconError extends PackageError {
  readonly directory: string;

  constructor(directory: string, message: string) {
    super('lexicon', message);
    this.directory = directory;
  }
}

export class ProcessError extends PackageError {
  readonly command: string;
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(
    command: string,
    message: string,
    details: { code?: number | null; signal?: NodeJS.Signals | null; cause?: unknown } = {}
  ) {
    super('build', message, { cause: details.cause });
    this.command = command;
    this.code = details.code ?? null;
    this.signal = details.signal ?? null;
  }
}

export class BuildError extends PackageError {
  constructor(message: string) {
    super('build', message);
  }
}

export class ArchiveError extends PackageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('archive', message, options);
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
