export interface SourcePosition {
  /** 1-based. */
  readonly line: number;
  /** 0-based, in UTF-16 code units. */
  readonly column: number;
}

export interface LineIndex {
  readonly lineCount: number;
  positionAt(offset: number): SourcePosition;
}

/** `\r\n`, a lone `\r` and `\n` each end a line. */
const collectLineStarts = (text: string): number[] => {
  const starts = [0];

  for (let i = 0; i < text.length; i += 1) {
    const code = text.charCodeAt(i);

    if (code === 10) {
      starts.push(i + 1);
    } else if (code === 13 && text.charCodeAt(i + 1) !== 10) {
      starts.push(i + 1);
    }
  }

  return starts;
};

export const createLineIndex = (text: string): LineIndex => {
  const starts = collectLineStarts(text);

  const positionAt = (offset: number): SourcePosition => {
    const clamped = Math.max(0, Math.min(offset, text.length));
    let low = 0;
    let high = starts.length - 1;

    while (low < high) {
      const mid = (low + high + 1) >> 1;

      if ((starts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return { line: low + 1, column: clamped - (starts[low] ?? 0) };
  };

  return { lineCount: starts.length, positionAt };
};
