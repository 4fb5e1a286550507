import { describe, expect, it } from 'vitest';

import type { RawToken } from '../../engine/types';
import type { Lexer } from '../../ports/lexer';

import { UnlexableFileError } from '../../engine/errors';
import { createGenericLexer } from './generic-lexer';
import { loadLanguageTable, parseLanguageTable } from './language-table';

const lexerFor = (id: string): Lexer => {
  const table = loadLanguageTable();
  const spec = table.languages.find(language => language.id === id);

  if (spec === undefined) {
    throw new Error(`missing language ${id}`);
  }

  return createGenericLexer(spec, table.operators);
};

const significant = (tokens: RawToken[]): Array<[string, string, number, number]> =>
  tokens.filter(token => token.kind !== 'whitespace').map(token => [token.kind, token.text, token.line, token.column]);

const lex = (id: string, sourceText: string, filePath = '/repo/src.txt'): RawToken[] =>
  lexerFor(id).tokenize({ filePath, sourceText });

describe('createGenericLexer', () => {
  it('should classify keywords, identifiers, operators and comments with positions', () => {
    // Arrange
    const source = 'def add(a, b):\n    return a + b  # sum\n';

    // Act
    const tokens = lex('python', source);

    // Assert
    expect(significant(tokens)).toEqual([
      ['keyword', 'def', 1, 0],
      ['identifier', 'add', 1, 4],
      ['other', '(', 1, 7],
      ['identifier', 'a', 1, 8],
      ['other', ',', 1, 9],
      ['identifier', 'b', 1, 11],
      ['other', ')', 1, 12],
      ['other', ':', 1, 13],
      ['keyword', 'return', 2, 4],
      ['identifier', 'a', 2, 11],
      ['other', '+', 2, 13],
      ['identifier', 'b', 2, 15],
      ['comment', '# sum', 2, 18],
    ]);
  });

  it('should reproduce the source when token texts are joined', () => {
    // Arrange
    const source = 'x = "a\\"b"  # note\r\ny = 1.5e-3 //= 2\n';

    // Act
    const tokens = lex('python', source);

    // Assert
    expect(tokens.map(token => token.text).join('')).toBe(source);
  });

  it('should read a multi-line string as one literal and keep counting lines', () => {
    // Arrange
    const source = 'x = """a\nb"""\ny';

    // Act
    const tokens = lex('python', source);

    // Assert
    expect(significant(tokens)).toEqual([
      ['identifier', 'x', 1, 0],
      ['other', '=', 1, 2],
      ['literal', '"""a\nb"""', 1, 4],
      ['identifier', 'y', 3, 0],
    ]);
  });

  it('should end an unterminated single-line string at the line break', () => {
    // Arrange & Act
    const tokens = lex('python', 's = "abc\nt');

    // Assert
    expect(significant(tokens)).toEqual([
      ['identifier', 's', 1, 0],
      ['other', '=', 1, 2],
      ['literal', '"abc', 1, 4],
      ['identifier', 't', 2, 0],
    ]);
  });

  it('should keep an escaped quote inside the literal', () => {
    // Arrange & Act
    const tokens = lex('python', '"a\\"b" c');

    // Assert
    expect(significant(tokens)).toEqual([
      ['literal', '"a\\"b"', 1, 0],
      ['identifier', 'c', 1, 7],
    ]);
  });

  it('should read Rust character literals and leave lifetimes as ordinary tokens', () => {
    // Arrange & Act
    const tokens = lex('rust', "let q = '\\''; fn f<'a>(s: &'a str) {}");

    // Assert
    expect(significant(tokens)).toEqual([
      ['keyword', 'let', 1, 0],
      ['identifier', 'q', 1, 4],
      ['other', '=', 1, 6],
      ['literal', "'\\''", 1, 8],
      ['other', ';', 1, 12],
      ['keyword', 'fn', 1, 14],
      ['identifier', 'f', 1, 17],
      ['other', '<', 1, 18],
      ['other', "'", 1, 19],
      ['identifier', 'a', 1, 20],
      ['other', '>', 1, 21],
      ['other', '(', 1, 22],
      ['identifier', 's', 1, 23],
      ['other', ':', 1, 24],
      ['other', '&', 1, 26],
      ['other', "'", 1, 27],
      ['identifier', 'a', 1, 28],
      ['identifier', 'str', 1, 30],
      ['other', ')', 1, 33],
      ['other', '{', 1, 35],
      ['other', '}', 1, 36],
    ]);
  });

  it('should read a plain and a braced-escape Rust character as one literal each', () => {
    // Arrange & Act
    const tokens = lex('rust', "['x', '\\u{1F600}']");

    // Assert
    expect(significant(tokens)).toEqual([
      ['other', '[', 1, 0],
      ['literal', "'x'", 1, 1],
      ['other', ',', 1, 4],
      ['literal', "'\\u{1F600}'", 1, 6],
      ['other', ']', 1, 17],
    ]);
  });

  it('should throw UnlexableFileError for an unterminated multi-line string', () => {
    // Arrange
    const run = () => lex('python', 'x = """never closed', '/repo/a.py');

    // Act & Assert
    expect(run).toThrow(UnlexableFileError);
    expect(run).toThrow('Cannot tokenize /repo/a.py: Unterminated string """ at 1:4');
  });

  it('should throw UnlexableFileError for an unterminated block comment', () => {
    // Arrange
    const run = () => lex('c', 'int x; /* open', '/repo/a.c');

    // Act & Assert
    expect(run).toThrow('Cannot tokenize /repo/a.c: Unterminated comment /* at 1:7');
  });

  it('should read numbers with exponents and radix prefixes as single literals', () => {
    // Arrange & Act
    const tokens = lex('c', '1.5e-3 + 0x1F');

    // Assert
    expect(significant(tokens)).toEqual([
      ['literal', '1.5e-3', 1, 0],
      ['other', '+', 1, 7],
      ['literal', '0x1F', 1, 9],
    ]);
  });

  it('should classify literal words as literals', () => {
    // Arrange & Act
    const tokens = lex('python', 'None True');

    // Assert
    expect(tokens.filter(token => token.kind === 'literal').map(token => token.text)).toEqual(['None', 'True']);
  });

  it('should prefer the longest operator', () => {
    // Arrange & Act
    const tokens = lex('python', 'a //= b');

    // Assert
    expect(significant(tokens)).toEqual([
      ['identifier', 'a', 1, 0],
      ['other', '//=', 1, 2],
      ['identifier', 'b', 1, 6],
    ]);
  });

  it('should match keywords case-insensitively where the language does', () => {
    // Arrange & Act
    const tokens = lex('sql', 'SELECT name FROM users WHERE id IS NULL');

    // Assert
    expect(tokens.filter(token => token.kind !== 'whitespace').map(token => token.kind)).toEqual([
      'keyword',
      'identifier',
      'keyword',
      'identifier',
      'keyword',
      'identifier',
      'keyword',
      'literal',
    ]);
  });

  it('should try block comments before line comments', () => {
    // Arrange & Act
    const tokens = lex('lua', '--[[ a\nb ]] x -- tail');

    // Assert
    expect(significant(tokens)).toEqual([
      ['comment', '--[[ a\nb ]]', 1, 0],
      ['identifier', 'x', 2, 5],
      ['comment', '-- tail', 2, 7],
    ]);
  });

  it('should accept extra identifier characters of the language', () => {
    // Arrange & Act
    const tokens = lex('ruby', '@count = $total');

    // Assert
    expect(significant(tokens)).toEqual([
      ['identifier', '@count', 1, 0],
      ['other', '=', 1, 7],
      ['identifier', '$total', 1, 9],
    ]);
  });

  it('should treat CRLF and lone CR as single line breaks', () => {
    // Arrange & Act
    const tokens = lex('c', 'a\r\nb\rc');

    // Assert
    expect(significant(tokens)).toEqual([
      ['identifier', 'a', 1, 0],
      ['identifier', 'b', 2, 0],
      ['identifier', 'c', 3, 0],
    ]);
  });

  it('should read Unicode letters as identifiers and keep surrogate pairs whole', () => {
    // Arrange & Act
    const tokens = lex('python', 'größe 😀');

    // Assert
    expect(significant(tokens)).toEqual([
      ['identifier', 'größe', 1, 0],
      ['other', '😀', 1, 6],
    ]);
  });
});

describe('parseLanguageTable', () => {
  it('should fill defaults for omitted fields', () => {
    // Arrange & Act
    const table = parseLanguageTable({ operators: ['=='], languages: [{ id: 'ini', extensions: ['.ini'] }] });

    // Assert
    expect(table.languages[0]).toEqual({
      id: 'ini',
      aliases: [],
      extensions: ['.ini'],
      lineComments: [],
      blockComments: [],
      strings: [],
      keywords: [],
      literalWords: [],
      caseInsensitiveKeywords: false,
      identifierChars: '',
    });
  });

  it('should reject an extension claimed by two languages', () => {
    // Arrange
    const raw = {
      operators: [],
      languages: [
        { id: 'one', extensions: ['.x'] },
        { id: 'two', extensions: ['.x'] },
      ],
    };

    // Act & Assert
    expect(() => parseLanguageTable(raw)).toThrow('extension .x is already claimed by one');
  });

  it('should reject unknown fields', () => {
    // Arrange
    const raw = { operators: [], languages: [{ id: 'one', extensions: ['.x'], colour: 'red' }] };

    // Act & Assert
    expect(() => parseLanguageTable(raw)).toThrow('[clonesift] Invalid language table');
  });

  it('should load the bundled table without duplicates', () => {
    // Arrange & Act
    const table = loadLanguageTable();

    // Assert
    expect(table.languages.map(language => language.id)).toContain('python');
    expect(loadLanguageTable()).toBe(table);
  });
});
