/**
 * Shell-style matching over whole strings: `*` is any run of characters
 * (`/` and the empty string included), `?` is any one character, `[...]` and
 * `[!...]` are classes. Every other character stands for itself.
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

const escapeRegex = (text: string): string => text.replace(REGEX_SPECIAL, '\\$&');

/** Index of the `]` closing the class opened at `open`, or -1. A leading `]` (after an optional `!`) is literal. */
const findClassEnd = (pattern: string, open: number): number => {
  let j = open + 1;

  if (pattern[j] === '!') {
    j += 1;
  }

  if (pattern[j] === ']') {
    j += 1;
  }

  return pattern.indexOf(']', j);
};

const translateClass = (body: string): string => {
  const negated = body.startsWith('!');
  const members = (negated ? body.slice(1) : body).replace(/[\\\]^[]/g, '\\$&');

  return `[${negated ? '^' : ''}${members}]`;
};

/** Throws on an unterminated `[` class or a class the RegExp engine rejects (e.g. `[z-a]`). */
export const compileFnmatch = (pattern: string): RegExp => {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern.charAt(i);

    if (ch === '*') {
      if (pattern.charAt(i - 1) !== '*') {
        source += '.*';
      }

      i += 1;
    } else if (ch === '?') {
      source += '.';
      i += 1;
    } else if (ch === '[') {
      const close = findClassEnd(pattern, i);

      if (close === -1) {
        throw new Error(`unterminated character class at offset ${i}`);
      }

      source += translateClass(pattern.slice(i + 1, close));
      i = close + 1;
    } else {
      source += escapeRegex(ch);
      i += 1;
    }
  }

  return new RegExp(`^(?:${source})$`, 's');
};
