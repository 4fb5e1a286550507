import type { RawToken, TokenKind } from '../../engine/types';
import type { Lexer, LexerInput } from '../../ports/lexer';
import type { LanguageSpec } from './language-table';

import { UnlexableFileError } from '../../engine/errors';

const IDENTIFIER_START = /[\p{L}_]/u;
const IDENTIFIER_PART = /[\p{L}\p{N}_]/u;
const DIGIT = /[0-9]/;
const NUMBER_PART = /[0-9A-Za-z_.]/;
const WHITESPACE = /[^\S\r\n]/;

interface CompiledLanguage {
  readonly spec: LanguageSpec;
  readonly keywords: ReadonlySet<string>;
  readonly literalWords: ReadonlySet<string>;
  readonly lineComments: ReadonlyArray<string>;
  readonly strings: ReadonlyArray<LanguageSpec['strings'][number]>;
  readonly operators: ReadonlyArray<string>;
}

const longestFirst = (values: ReadonlyArray<string>): string[] => [...values].sort((left, right) => right.length - left.length);

const compileLanguage = (spec: LanguageSpec, operators: ReadonlyArray<string>): CompiledLanguage => {
  const fold = (word: string): string => (spec.caseInsensitiveKeywords ? word.toLowerCase() : word);

  return {
    spec,
    keywords: new Set(spec.keywords.map(fold)),
    literalWords: new Set(spec.literalWords.map(fold)),
    lineComments: longestFirst(spec.lineComments),
    strings: [...spec.strings].sort((left, right) => right.open.length - left.open.length),
    operators: longestFirst(operators),
  };
};

/**
 * Single pass, no lookbehind beyond the current token. Unterminated block
 * comments and multi-line strings make the file unlexable; a single-line
 * string left open ends at the line break.
 */
const tokenizeWith = (language: CompiledLanguage, input: LexerInput): RawToken[] => {
  const text = input.sourceText;
  const tokens: RawToken[] = [];
  const { spec } = language;
  let offset = 0;
  let line = 1;
  let column = 0;

  const startsWithAt = (needle: string, at = offset): boolean => text.startsWith(needle, at);

  // Advances over `length` code units, keeping line and column in step.
  const advance = (length: number): void => {
    const end = Math.min(text.length, offset + length);

    while (offset < end) {
      const code = text.charCodeAt(offset);

      offset += 1;

      if (code === 10 || (code === 13 && text.charCodeAt(offset) !== 10)) {
        line += 1;
        column = 0;
      } else {
        column += 1;
      }
    }
  };

  const push = (kind: TokenKind, length: number): void => {
    tokens.push({ kind, text: text.slice(offset, offset + length), line, column });

    advance(length);
  };

  const unlexable = (reason: string): UnlexableFileError => {
    return new UnlexableFileError(input.filePath, `${reason} at ${line}:${column}`);
  };

  const isIdentifierChar = (char: string, start: boolean): boolean => {
    if (spec.identifierChars.includes(char)) {
      return true;
    }

    return start ? IDENTIFIER_START.test(char) : IDENTIFIER_PART.test(char);
  };

  const scanString = (open: string, close: string, multiline: boolean, escape: string | undefined): number => {
    let cursor = offset + open.length;

    while (cursor < text.length) {
      const char = text.charAt(cursor);

      if (escape !== undefined && char === escape) {
        cursor += 2;

        continue;
      }

      if (text.startsWith(close, cursor)) {
        return cursor + close.length - offset;
      }

      if (!multiline && (char === '\n' || char === '\r')) {
        return cursor - offset;
      }

      cursor += 1;
    }

    if (multiline) {
      throw unlexable(`Unterminated string ${open}`);
    }

    return text.length - offset;
  };

  // Length of a one-character literal at `offset`, or null when the opener starts something else.
  const scanCharLiteral = (open: string, close: string, escape: string | undefined): number | null => {
    const bodyStart = offset + open.length;
    const first = text.charAt(bodyStart);

    if (escape !== undefined && first === escape) {
      const end = text.indexOf(close, bodyStart + 2);

      if (end < 0 || /[\r\n]/.test(text.slice(bodyStart, end))) {
        return null;
      }

      return end + close.length - offset;
    }

    const code = text.charCodeAt(bodyStart);
    const width = code >= 0xd800 && code <= 0xdbff ? 2 : 1;

    if (first === '' || first === '\n' || first === '\r' || !text.startsWith(close, bodyStart + width)) {
      return null;
    }

    return open.length + width + close.length;
  };

  scan: while (offset < text.length) {
    const char = text.charAt(offset);

    if (char === '\r' || char === '\n') {
      push('whitespace', char === '\r' && text.charAt(offset + 1) === '\n' ? 2 : 1);

      continue;
    }

    if (WHITESPACE.test(char)) {
      let end = offset + 1;

      while (end < text.length && WHITESPACE.test(text.charAt(end))) {
        end += 1;
      }

      push('whitespace', end - offset);

      continue;
    }

    for (const block of spec.blockComments) {
      if (startsWithAt(block.open)) {
        const close = text.indexOf(block.close, offset + block.open.length);

        if (close < 0) {
          throw unlexable(`Unterminated comment ${block.open}`);
        }

        push('comment', close + block.close.length - offset);

        continue scan;
      }
    }

    for (const marker of language.lineComments) {
      if (startsWithAt(marker)) {
        let end = offset + marker.length;

        while (end < text.length && text.charAt(end) !== '\n' && text.charAt(end) !== '\r') {
          end += 1;
        }

        push('comment', end - offset);

        continue scan;
      }
    }

    for (const delimiter of language.strings) {
      if (!startsWithAt(delimiter.open)) {
        continue;
      }

      const length = delimiter.singleChar
        ? scanCharLiteral(delimiter.open, delimiter.close, delimiter.escape)
        : scanString(delimiter.open, delimiter.close, delimiter.multiline, delimiter.escape);

      if (length !== null) {
        push('literal', length);

        continue scan;
      }
    }

    if (DIGIT.test(char) || (char === '.' && DIGIT.test(text.charAt(offset + 1)))) {
      let end = offset + 1;

      while (end < text.length) {
        const next = text.charAt(end);

        if (NUMBER_PART.test(next)) {
          end += 1;
        } else if ((next === '+' || next === '-') && /[eE]/.test(text.charAt(end - 1)) && DIGIT.test(text.charAt(end + 1))) {
          end += 1;
        } else {
          break;
        }
      }

      push('literal', end - offset);

      continue;
    }

    if (isIdentifierChar(char, true)) {
      let end = offset + 1;

      while (end < text.length && isIdentifierChar(text.charAt(end), false)) {
        end += 1;
      }

      const word = text.slice(offset, end);
      const folded = spec.caseInsensitiveKeywords ? word.toLowerCase() : word;

      if (language.literalWords.has(folded)) {
        push('literal', end - offset);
      } else if (language.keywords.has(folded)) {
        push('keyword', end - offset);
      } else {
        push('identifier', end - offset);
      }

      continue;
    }

    const operator = language.operators.find(candidate => startsWithAt(candidate));

    // A lone surrogate half would split a code point; keep pairs together.
    const code = text.charCodeAt(offset);
    const width = operator?.length ?? (code >= 0xd800 && code <= 0xdbff && offset + 1 < text.length ? 2 : 1);

    push('other', width);
  }

  return tokens;
};

export const createGenericLexer = (spec: LanguageSpec, operators: ReadonlyArray<string>): Lexer => {
  const language = compileLanguage(spec, operators);

  return {
    id: spec.id,
    aliases: spec.aliases,
    extensions: spec.extensions,
    tokenize: (input: LexerInput) => tokenizeWith(language, input),
  };
};
