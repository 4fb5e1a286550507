import type { NormalizationLevel } from '../types';
import type { NormalizedStream, RawTokenStream, Token, TokenKind } from './types';

import { UnsupportedTokenKindError } from './errors';
import { TOKEN_KINDS } from './types';

export const IDENTIFIER_SENTINEL = 'ID';
export const LITERAL_SENTINEL = 'LIT';

const KNOWN_KINDS: ReadonlySet<string> = new Set<string>(TOKEN_KINDS);

const isTokenKind = (kind: string): kind is TokenKind => KNOWN_KINDS.has(kind);

const isTrivia = (kind: TokenKind): boolean => kind === 'whitespace' || kind === 'comment';

const normalizeText = (kind: TokenKind, text: string, level: NormalizationLevel): string => {
  if (level >= 1 && kind === 'identifier') {
    return IDENTIFIER_SENTINEL;
  }

  if (level >= 2 && kind === 'literal') {
    return LITERAL_SENTINEL;
  }

  return text;
};

/**
 * Drops trivia and rewrites `normalizedText` per level. Throws
 * {@link UnsupportedTokenKindError} on the first token whose kind is unknown.
 */
export const normalize = (stream: RawTokenStream, level: NormalizationLevel): NormalizedStream => {
  const tokens: Token[] = [];

  for (const raw of stream.tokens) {
    if (!isTokenKind(raw.kind)) {
      throw new UnsupportedTokenKindError({
        filePath: stream.filePath,
        kind: raw.kind,
        line: raw.line,
        column: raw.column,
      });
    }

    if (isTrivia(raw.kind)) {
      continue;
    }

    tokens.push({
      kind: raw.kind,
      normalizedText: normalizeText(raw.kind, raw.text, level),
      originalText: raw.text,
      fileId: stream.fileId,
      line: raw.line,
      column: raw.column,
    });
  }

  return { fileId: stream.fileId, filePath: stream.filePath, level, tokens };
};
