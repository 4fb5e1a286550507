import type { CloneSiftLogLevel } from './clonesift-config';
import type { LexerRegistry } from './ports/lexer';
import type { CloneSiftLogger } from './ports/logger';
import type { NormalizationLevel, OutputFormat } from './types';

export interface CloneSiftCliExplicitFlags {
  readonly format: boolean;
  readonly minTokens: boolean;
  readonly k: boolean;
  readonly window: boolean;
  readonly normalize: boolean;
  readonly gapTolerance: boolean;
  readonly minFamilySize: boolean;
  readonly languages: boolean;
  readonly exitOnFindings: boolean;
  readonly configPath: boolean;
  readonly logLevel: boolean;
  readonly logStack: boolean;
}

export interface CloneSiftCliOptions {
  readonly targets: readonly string[];
  readonly format: OutputFormat;
  readonly minTokens: number;
  readonly k: number;
  readonly window: number;
  readonly normalize: NormalizationLevel;
  readonly gapTolerance: number;
  /** Added to the config file's patterns. */
  readonly suppress: ReadonlyArray<string>;
  readonly minFamilySize: number;
  /** Added to the config file's ignore globs. */
  readonly ignore: ReadonlyArray<string>;
  readonly languages: ReadonlyArray<string>;
  readonly concurrency?: number;
  readonly exitOnFindings: boolean;
  readonly help: boolean;
  readonly version: boolean;
  readonly configPath?: string;
  readonly logLevel?: CloneSiftLogLevel;
  readonly logStack?: boolean;
  readonly explicit?: CloneSiftCliExplicitFlags;
}

/** Everything one scan needs, after CLI flags, config file and defaults are merged. */
export interface ScanOptions {
  readonly rootAbs: string;
  readonly targets: readonly string[];
  readonly k: number;
  readonly window: number;
  readonly minTokens: number;
  readonly normalize: NormalizationLevel;
  readonly gapTolerance: number;
  readonly suppressionPatterns: ReadonlyArray<string>;
  readonly minFamilySize: number;
  readonly ignore: ReadonlyArray<string>;
  readonly languages: ReadonlyArray<string>;
  readonly concurrency: number;
}

/** Injecting `lexers` or `readSource` keeps the per-file stage off worker threads, which build their own. */
export interface ScanDependencies {
  readonly logger: CloneSiftLogger;
  readonly lexers?: LexerRegistry;
  readonly readSource?: (filePath: string) => Promise<string>;
}
