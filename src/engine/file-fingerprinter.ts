import * as path from 'node:path';

import type { Lexer, LexerRegistry } from '../ports/lexer';
import type { NormalizationLevel, SkippedFile } from '../types';
import type { Fingerprint, FingerprintOptions, NormalizedStream, TokenHasher } from './types';

import { UnlexableFileError, UnsupportedTokenKindError } from './errors';
import { generateKGrams } from './kgrams';
import { normalize } from './normalizer';
import { selectFingerprints } from './winnowing';

export interface SourceFile {
  readonly fileId: number;
  readonly filePath: string;
  readonly sourceText: string;
}

interface FileFingerprintOk {
  readonly ok: true;
  readonly stream: NormalizedStream;
  readonly fingerprints: ReadonlyArray<Fingerprint>;
}

interface FileFingerprintFail {
  readonly ok: false;
  readonly skipped: SkippedFile;
}

export type FileFingerprintOutcome = FileFingerprintOk | FileFingerprintFail;

export interface FileFingerprintParams extends FingerprintOptions {
  readonly level: NormalizationLevel;
  readonly hashToken: TokenHasher;
}

export const toSkippedFile = (filePath: string, error: unknown): SkippedFile => {
  if (error instanceof UnsupportedTokenKindError) {
    return { filePath, reason: 'unsupported-token-kind', message: error.message };
  }

  if (error instanceof UnlexableFileError) {
    return { filePath, reason: 'unlexable', message: error.reason };
  }

  return { filePath, reason: 'unlexable', message: error instanceof Error ? error.message : String(error) };
};

/** Normalizer → k-grams → winnowing for one already lexed stream. */
export const fingerprintStream = (
  stream: NormalizedStream,
  params: Pick<FileFingerprintParams, 'k' | 'window' | 'hashToken'>,
): Fingerprint[] => {
  return selectFingerprints(generateKGrams(stream, params.k, params.hashToken), params.window);
};

/**
 * Per-file stage. Never throws: lexer and normalizer failures come back as a
 * skipped file so one bad input cannot abort the batch.
 */
export const fingerprintFile = (file: SourceFile, lexer: Lexer, params: FileFingerprintParams): FileFingerprintOutcome => {
  try {
    const tokens = lexer.tokenize({ filePath: file.filePath, sourceText: file.sourceText });
    const stream = normalize({ fileId: file.fileId, filePath: file.filePath, tokens }, params.level);

    return { ok: true, stream, fingerprints: fingerprintStream(stream, params) };
  } catch (error) {
    const wrapped =
      error instanceof UnsupportedTokenKindError || error instanceof UnlexableFileError
        ? error
        : new UnlexableFileError(file.filePath, error instanceof Error ? error.message : String(error));

    return { ok: false, skipped: toSkippedFile(file.filePath, wrapped) };
  }
};

export interface FingerprintTask {
  readonly fileId: number;
  readonly filePath: string;
}

interface FingerprintTaskOk extends FileFingerprintOk {
  readonly fileId: number;
  readonly sourceText: string;
}

interface FingerprintTaskFail extends FileFingerprintFail {
  readonly fileId: number;
}

/** Per-file result as it crosses a worker boundary: plain data only. */
export type FingerprintTaskResult = FingerprintTaskOk | FingerprintTaskFail;

export interface FingerprintEnvironment {
  readonly readSource: (filePath: string) => Promise<string>;
  readonly lexers: LexerRegistry;
  readonly params: FileFingerprintParams;
}

/** Read, pick a lexer, fingerprint. Resolves for every file, never rejects. */
export const fingerprintTask = async (task: FingerprintTask, environment: FingerprintEnvironment): Promise<FingerprintTaskResult> => {
  const { fileId, filePath } = task;
  let sourceText: string;

  try {
    sourceText = await environment.readSource(filePath);
  } catch (error) {
    return { ok: false, fileId, skipped: toSkippedFile(filePath, error) };
  }

  const lexer = environment.lexers.forFile(filePath);

  if (lexer === null) {
    return {
      ok: false,
      fileId,
      skipped: { filePath, reason: 'unlexable', message: `no lexer for ${path.extname(filePath) || 'files without an extension'}` },
    };
  }

  const outcome = fingerprintFile({ fileId, filePath, sourceText }, lexer, environment.params);

  return outcome.ok ? { ...outcome, fileId, sourceText } : { ...outcome, fileId };
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/** Shape check for results coming back from a worker thread. */
export const isFingerprintTaskResult = (value: unknown): value is FingerprintTaskResult => {
  if (!isRecord(value) || typeof value['fileId'] !== 'number') {
    return false;
  }

  if (value['ok'] === true) {
    return typeof value['sourceText'] === 'string' && isRecord(value['stream']) && Array.isArray(value['fingerprints']);
  }

  const skipped = value['skipped'];

  return value['ok'] === false && isRecord(skipped) && typeof skipped['message'] === 'string';
};
