import type { RawToken } from '../engine/types';

export interface LexerInput {
  readonly filePath: string;
  readonly sourceText: string;
}

/**
 * Turns source text into raw tokens. Token kinds are plain strings so that a
 * lexer can report something the normalizer does not know; the normalizer
 * rejects those files.
 */
export interface Lexer {
  readonly id: string;
  readonly aliases: ReadonlyArray<string>;
  /** Lower-case, with the leading dot. */
  readonly extensions: ReadonlyArray<string>;
  tokenize(input: LexerInput): RawToken[];
}

export interface LexerRegistry {
  readonly lexers: ReadonlyArray<Lexer>;
  /** Resolves by file extension; null when no lexer claims the file. */
  forFile(filePath: string): Lexer | null;
  /** Matches a language id or alias, case-insensitively. */
  byLanguage(name: string): Lexer | null;
}
