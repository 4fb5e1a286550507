import * as path from 'node:path';

import type { Lexer, LexerRegistry } from '../../ports/lexer';

import { createGenericLexer } from './generic-lexer';
import { loadLanguageTable } from './language-table';
import { createTypeScriptLexer } from './typescript-lexer';

/** Later lexers never take over an extension an earlier one claimed. */
export const createLexerRegistry = (lexers: ReadonlyArray<Lexer>): LexerRegistry => {
  const byExtension = new Map<string, Lexer>();
  const byName = new Map<string, Lexer>();

  for (const lexer of lexers) {
    for (const extension of lexer.extensions) {
      const key = extension.toLowerCase();

      if (!byExtension.has(key)) {
        byExtension.set(key, lexer);
      }
    }

    for (const name of [lexer.id, ...lexer.aliases]) {
      const key = name.toLowerCase();

      if (!byName.has(key)) {
        byName.set(key, lexer);
      }
    }
  }

  return {
    lexers,
    forFile: (filePath: string) => byExtension.get(path.extname(filePath).toLowerCase()) ?? null,
    byLanguage: (name: string) => byName.get(name.trim().toLowerCase()) ?? null,
  };
};

export const createDefaultLexerRegistry = (): LexerRegistry => {
  const table = loadLanguageTable();

  return createLexerRegistry([
    createTypeScriptLexer(),
    ...table.languages.map(language => createGenericLexer(language, table.operators)),
  ]);
};
