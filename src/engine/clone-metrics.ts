import type { CloneGroup, CloneType, ReportedCloneGroup } from '../types';
import type { NormalizedStream } from './types';

/**
 * Share of aligned token positions whose original text is identical. A group
 * found at normalization level 0 always scores 1.
 */
export const computeSimilarity = (group: CloneGroup, streamA: NormalizedStream, streamB: NormalizedStream): number => {
  if (group.tokenCount <= 0) {
    return 1;
  }

  const startA = group.occurrenceA.tokenRange.start;
  const startB = group.occurrenceB.tokenRange.start;
  let same = 0;

  for (let offset = 0; offset < group.tokenCount; offset += 1) {
    if (streamA.tokens[startA + offset]?.originalText === streamB.tokens[startB + offset]?.originalText) {
      same += 1;
    }
  }

  return same / group.tokenCount;
};

export const classifyClone = (similarity: number): CloneType => (similarity >= 1 ? 'type-1' : 'type-2');

/** Lines spanned by the longer of the two occurrences. */
export const cloneLineCount = (group: CloneGroup): number => {
  const a = group.occurrenceA.lineRange;
  const b = group.occurrenceB.lineRange;

  return Math.max(a.end - a.start + 1, b.end - b.start + 1);
};

export const toReportedGroup = (
  group: CloneGroup,
  streams: ReadonlyMap<number, NormalizedStream>,
): ReportedCloneGroup => {
  const streamA = streams.get(group.occurrenceA.fileId);
  const streamB = streams.get(group.occurrenceB.fileId);
  const similarity = streamA !== undefined && streamB !== undefined ? computeSimilarity(group, streamA, streamB) : 1;

  return {
    ...group,
    lineCount: cloneLineCount(group),
    similarity,
    cloneType: classifyClone(similarity),
  };
};
