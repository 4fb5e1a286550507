export { scanUseCase, detectClones, validateDetectionSettings, type DetectionSettings } from './application/scan/scan.usecase';
export { runCli, resolveOptions, EXIT_CLEAN, EXIT_FATAL, EXIT_FINDINGS, type CliIo } from './adapters/cli/entry';
export { parseArgs } from './arg-parse';
export { loadCloneSiftConfigFile } from './clonesift-config.loader';
export { formatReport, buildCloneReports, type FormatReportOptions } from './report';
export {
  discoverFiles,
  type DirectoryEntry,
  type DiscoveryOptions,
  type DiscoveryResult,
  type UnreadablePath,
} from './target-discovery';

export { createTokenHasher, hashString, mix64 } from './engine/hasher';
export { normalize } from './engine/normalizer';
export { generateKGrams } from './engine/kgrams';
export { detectionThreshold, selectFingerprints } from './engine/winnowing';
export { buildCorpusIndex, createCorpusIndexBuilder, type CorpusIndex } from './engine/corpus-index';
export { assembleClones, type AssembleOptions } from './engine/clone-assembler';
export { fingerprintFile, fingerprintStream, fingerprintTask } from './engine/file-fingerprinter';
export { runFingerprintPool, spawnFingerprintWorker, type FingerprintWorkerPort } from './workers/fingerprint-pool';
export { computeSimilarity, toReportedGroup } from './engine/clone-metrics';
export { ConfigError, InvalidSuppressionPatternError, UnlexableFileError, UnsupportedTokenKindError } from './engine/errors';
export type { Fingerprint, KGram, NormalizedStream, RawToken, RawTokenStream, Token, TokenKind } from './engine/types';

export { buildCloneFamilies, compileSuppressionRules, suppressClones, type SuppressionRule } from './features/suppression';

export { createDefaultLexerRegistry, createLexerRegistry } from './infrastructure/lexers/lexer-registry';
export { createGenericLexer } from './infrastructure/lexers/generic-lexer';
export { createTypeScriptLexer } from './infrastructure/lexers/typescript-lexer';
export { createPrettyConsoleLogger } from './infrastructure/logging/pretty-console-logger';
export {
  createCloneSiftLogger,
  createNoopLogger,
  isLogLevelEnabled,
  withLogFields,
  type CloneSiftLogFields,
  type CloneSiftLogger,
  type CloneSiftLogSink,
} from './ports/logger';
export type { Lexer, LexerInput, LexerRegistry } from './ports/lexer';

export type { CloneSiftCliOptions, ScanDependencies, ScanOptions } from './interfaces';
export type * from './types';
