import ts from 'typescript';

import type { RawToken, TokenKind } from '../../engine/types';
import type { Lexer, LexerInput } from '../../ports/lexer';

import { createLineIndex } from '../../engine/source-position';

const LITERAL_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.TemplateHead,
  ts.SyntaxKind.TemplateMiddle,
  ts.SyntaxKind.TemplateTail,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
]);

// After one of these a `/` divides; anywhere else it opens a regular expression.
const EXPRESSION_END_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.Identifier,
  ts.SyntaxKind.PrivateIdentifier,
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.TemplateTail,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.CloseBracketToken,
  ts.SyntaxKind.CloseBraceToken,
  ts.SyntaxKind.PlusPlusToken,
  ts.SyntaxKind.MinusMinusToken,
  ts.SyntaxKind.ThisKeyword,
  ts.SyntaxKind.SuperKeyword,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
]);

export const classifySyntaxKind = (kind: ts.SyntaxKind): TokenKind => {
  if (LITERAL_KINDS.has(kind)) {
    return 'literal';
  }

  if (kind === ts.SyntaxKind.Identifier || kind === ts.SyntaxKind.PrivateIdentifier) {
    return 'identifier';
  }

  if (kind >= ts.SyntaxKind.FirstKeyword && kind <= ts.SyntaxKind.LastKeyword) {
    return 'keyword';
  }

  switch (kind) {
    case ts.SyntaxKind.SingleLineCommentTrivia:
    case ts.SyntaxKind.MultiLineCommentTrivia:
    case ts.SyntaxKind.ShebangTrivia:
    case ts.SyntaxKind.ConflictMarkerTrivia:
      return 'comment';
    case ts.SyntaxKind.WhitespaceTrivia:
    case ts.SyntaxKind.NewLineTrivia:
      return 'whitespace';
    default:
      return 'other';
  }
};

const isTrivia = (kind: ts.SyntaxKind): boolean => {
  const tokenKind = classifySyntaxKind(kind);

  return tokenKind === 'comment' || tokenKind === 'whitespace';
};

type BraceFrame = 'block' | 'template';

/**
 * Scans without a parser. Template continuations and regular expressions,
 * which the scanner only recognises when asked, are rescanned from a brace
 * stack and the previous significant token.
 */
const tokenizeTypeScript = (input: LexerInput): RawToken[] => {
  const lineIndex = createLineIndex(input.sourceText);
  const scanner = ts.createScanner(ts.ScriptTarget.Latest, false, ts.LanguageVariant.Standard, input.sourceText);
  const tokens: RawToken[] = [];
  const braces: BraceFrame[] = [];
  let previousSignificant: ts.SyntaxKind | null = null;

  for (let kind = scanner.scan(); kind !== ts.SyntaxKind.EndOfFileToken; kind = scanner.scan()) {
    if (kind === ts.SyntaxKind.OpenBraceToken) {
      braces.push('block');
    } else if (kind === ts.SyntaxKind.TemplateHead) {
      braces.push('template');
    } else if (kind === ts.SyntaxKind.CloseBraceToken) {
      const frame = braces.pop();

      if (frame === 'template') {
        kind = scanner.reScanTemplateToken(false);

        if (kind === ts.SyntaxKind.TemplateMiddle) {
          braces.push('template');
        }
      }
    } else if (
      (kind === ts.SyntaxKind.SlashToken || kind === ts.SyntaxKind.SlashEqualsToken) &&
      (previousSignificant === null || !EXPRESSION_END_KINDS.has(previousSignificant))
    ) {
      kind = scanner.reScanSlashToken();
    }

    const { line, column } = lineIndex.positionAt(scanner.getTokenStart());

    tokens.push({ kind: classifySyntaxKind(kind), text: scanner.getTokenText(), line, column });

    if (!isTrivia(kind)) {
      previousSignificant = kind;
    }
  }

  return tokens;
};

export const createTypeScriptLexer = (): Lexer => {
  return {
    id: 'typescript',
    aliases: ['ts', 'javascript', 'js', 'tsx', 'jsx'],
    extensions: ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'],
    tokenize: tokenizeTypeScript,
  };
};
