import type { NormalizationLevel } from '../types';

export const TOKEN_KINDS = ['identifier', 'literal', 'keyword', 'comment', 'whitespace', 'other'] as const;

export type TokenKind = (typeof TOKEN_KINDS)[number];

/**
 * Token as emitted by a lexer. `kind` stays a plain string because lexers are
 * pluggable; the normalizer is the one that rejects kinds it does not know.
 */
export interface RawToken {
  readonly kind: string;
  readonly text: string;
  readonly line: number;
  readonly column: number;
}

export interface RawTokenStream {
  readonly fileId: number;
  readonly filePath: string;
  readonly tokens: ReadonlyArray<RawToken>;
}

export interface Token {
  readonly kind: TokenKind;
  readonly normalizedText: string;
  readonly originalText: string;
  readonly fileId: number;
  readonly line: number;
  readonly column: number;
}

export interface NormalizedStream {
  readonly fileId: number;
  readonly filePath: string;
  readonly level: NormalizationLevel;
  readonly tokens: ReadonlyArray<Token>;
}

export interface KGram {
  readonly fileId: number;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly hash: bigint;
}

export interface Fingerprint {
  readonly hash: bigint;
  readonly fileId: number;
  readonly startIndex: number;
  readonly endIndex: number;
}

export type TokenHasher = (text: string) => bigint;

export interface FingerprintOptions {
  readonly k: number;
  readonly window: number;
}
