import type { LineRange } from '../../types';

/**
 * Raw lines a suppression rule is matched against: `contextAbove` lines
 * before the clone (clamped at line 1) and every line the clone covers.
 * Line numbers are 1-based and inclusive.
 */
export const extractContextLines = (
  lines: ReadonlyArray<string>,
  lineRange: LineRange,
  contextAbove = 1,
): string[] => {
  const first = Math.max(1, lineRange.start - Math.max(0, contextAbove));
  const last = Math.min(lines.length, lineRange.end);

  if (last < first) {
    return [];
  }

  return lines.slice(first - 1, last);
};

export const splitLines = (sourceText: string): string[] => sourceText.split(/\r\n|\r|\n/);
