export interface PackageOptions {
  root: string;
  jar: string;
  source: string;
  output: string;
  archive: string;
  encoding: string;
  java: string;
  timeoutMs: number;
  keepOutput: boolean;
  dryRun: boolean;
}

export interface LexiconFile {
  name: string;
  entries: number;
}

export interface LexiconSummary {
  directory: string;
  encoding: string;
  decodedAs: string;
  files: LexiconFile[];
  entries: number;
}

export interface ProcessResult {
  code: number;
  durationMs: number;
}

export interface Invocation {
  command: string;
  args: string[];
}

export interface ArchiveEntry {
  name: string;
  size: number;
}

export interface Manifest {
  generatedAt: string;
  encoding: string;
  source: string;
  lexiconEntries: number;
  archive: string;
  archiveSha256: string;
  archiveSize: number;
  entries: ArchiveEntry[];
}

export interface PackageResult {
  archivePath: string;
  manifestPath: string;
  manifest: Manifest;
}

export type DictionaryBuilder = (options: PackageOptions) => Promise<void>;

export type BuildStep = 'config' | 'lexicon' | 'build' | 'archive';
