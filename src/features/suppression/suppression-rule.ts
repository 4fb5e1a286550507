import { InvalidSuppressionPatternError } from '../../engine/errors';
import { compileFnmatch } from '../../shared/fnmatch';

export interface SuppressionRule {
  readonly pattern: string;
  matches(line: string): boolean;
}

export const compileSuppressionRule = (pattern: string): SuppressionRule => {
  if (pattern.length === 0) {
    throw new InvalidSuppressionPatternError(pattern, 'pattern is empty');
  }

  let regex: RegExp;

  try {
    regex = compileFnmatch(pattern);
  } catch (error) {
    throw new InvalidSuppressionPatternError(pattern, error instanceof Error ? error.message : String(error));
  }

  return {
    pattern,
    matches: (line: string) => regex.test(line),
  };
};

/** Compiles every pattern up front; the first malformed one aborts the whole set. */
export const compileSuppressionRules = (patterns: ReadonlyArray<string>): SuppressionRule[] => {
  return patterns.map(compileSuppressionRule);
};
