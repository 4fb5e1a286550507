import type { CloneGroup, CloneOccurrence } from '../types';
import type { CorpusIndex } from './corpus-index';
import type { Fingerprint, NormalizedStream } from './types';

export interface AssembleOptions {
  readonly minTokens: number;
  readonly gapTolerance?: number;
}

export interface MatchPair {
  readonly a: Fingerprint;
  readonly b: Fingerprint;
}

export interface FilePairPartition {
  readonly fileIdA: number;
  readonly fileIdB: number;
  readonly pairs: MatchPair[];
}

interface Run {
  aStart: number;
  aEnd: number;
  readonly diagonal: number;
}

const comparePosition = (left: Fingerprint, right: Fingerprint): number => {
  return left.fileId - right.fileId || left.startIndex - right.startIndex;
};

/**
 * Enumerates every unordered occurrence pair of each colliding hash, oriented so
 * that `a` precedes `b` by (fileId, startIndex), and buckets them per file pair.
 * Partitions come back ordered by file pair.
 */
export const partitionMatchPairs = (index: CorpusIndex): FilePairPartition[] => {
  const partitions = new Map<string, FilePairPartition>();

  for (const [, bucket] of index.buckets()) {
    const sorted = [...bucket].sort(comparePosition);

    for (let i = 0; i < sorted.length; i += 1) {
      const a = sorted[i];

      if (a === undefined) {
        continue;
      }

      for (let j = i + 1; j < sorted.length; j += 1) {
        const b = sorted[j];

        if (b === undefined) {
          continue;
        }

        const key = `${a.fileId}:${b.fileId}`;
        let partition = partitions.get(key);

        if (!partition) {
          partition = { fileIdA: a.fileId, fileIdB: b.fileId, pairs: [] };

          partitions.set(key, partition);
        }

        partition.pairs.push({ a, b });
      }
    }
  }

  return [...partitions.values()].sort((left, right) => left.fileIdA - right.fileIdA || left.fileIdB - right.fileIdB);
};

const textEquals = (left: NormalizedStream, leftIndex: number, right: NormalizedStream, rightIndex: number): boolean => {
  const l = left.tokens[leftIndex];
  const r = right.tokens[rightIndex];

  return l !== undefined && r !== undefined && l.normalizedText === r.normalizedText;
};

const coalesceDiagonal = (pairs: ReadonlyArray<MatchPair>, diagonal: number, gapTolerance: number): Run[] => {
  const runs: Run[] = [];
  let current: Run | null = null;

  for (const { a } of pairs) {
    if (current !== null && a.startIndex - current.aEnd <= gapTolerance) {
      current.aEnd = Math.max(current.aEnd, a.endIndex);

      continue;
    }

    if (current !== null) {
      runs.push(current);
    }

    current = { aStart: a.startIndex, aEnd: a.endIndex, diagonal };
  }

  if (current !== null) {
    runs.push(current);
  }

  return runs;
};

/** Grows a run token by token in both directions while normalized texts agree. */
const extendRun = (run: Run, streamA: NormalizedStream, streamB: NormalizedStream): Run => {
  const d = run.diagonal;
  const lengthA = streamA.tokens.length;
  const lengthB = streamB.tokens.length;
  let { aStart, aEnd } = run;

  while (aEnd < lengthA && aEnd + d < lengthB && textEquals(streamA, aEnd, streamB, aEnd + d)) {
    aEnd += 1;
  }

  while (aStart > 0 && aStart + d > 0 && textEquals(streamA, aStart - 1, streamB, aStart - 1 + d)) {
    aStart -= 1;
  }

  return { aStart, aEnd, diagonal: d };
};

/**
 * A same-file run longer than its diagonal overlaps its own partner: the text
 * is periodic with period `diagonal`. Cutting it into `diagonal`-long pieces
 * keeps every copy in some group while no piece overlaps its partner.
 */
const splitPeriodicRun = (run: Run): Run[] => {
  const d = run.diagonal;

  if (run.aEnd - run.aStart <= d) {
    return [run];
  }

  const pieces: Run[] = [];

  for (let start = run.aStart; start < run.aEnd; start += d) {
    pieces.push({ aStart: start, aEnd: Math.min(start + d, run.aEnd), diagonal: d });
  }

  return pieces;
};

const mergeOverlapping = (runs: ReadonlyArray<Run>): Run[] => {
  const sorted = [...runs].sort((left, right) => left.aStart - right.aStart);
  const merged: Run[] = [];

  for (const run of sorted) {
    const last = merged[merged.length - 1];

    if (last !== undefined && run.aStart <= last.aEnd) {
      last.aEnd = Math.max(last.aEnd, run.aEnd);

      continue;
    }

    merged.push({ ...run });
  }

  return merged;
};

const toOccurrence = (stream: NormalizedStream, start: number, end: number): CloneOccurrence => {
  const first = stream.tokens[start];
  const last = stream.tokens[end - 1];

  if (first === undefined || last === undefined) {
    throw new Error(`Token range [${start}, ${end}) is outside ${stream.filePath}`);
  }

  return {
    fileId: stream.fileId,
    filePath: stream.filePath,
    tokenRange: { start, end },
    lineRange: { start: first.line, end: last.line },
  };
};

const subsumes = (outer: CloneGroup, inner: CloneGroup): boolean => {
  const oa = outer.occurrenceA.tokenRange;
  const ob = outer.occurrenceB.tokenRange;
  const ia = inner.occurrenceA.tokenRange;
  const ib = inner.occurrenceB.tokenRange;

  return oa.start <= ia.start && ia.end <= oa.end && ob.start <= ib.start && ib.end <= ob.end;
};

const compareGroups = (left: CloneGroup, right: CloneGroup): number => {
  return (
    left.occurrenceA.tokenRange.start - right.occurrenceA.tokenRange.start ||
    left.occurrenceB.tokenRange.start - right.occurrenceB.tokenRange.start
  );
};

const dropSubsumed = (groups: ReadonlyArray<CloneGroup>): CloneGroup[] => {
  const bySize = [...groups].sort((left, right) => right.tokenCount - left.tokenCount || compareGroups(left, right));
  const kept: CloneGroup[] = [];

  for (const group of bySize) {
    if (kept.some(existing => subsumes(existing, group))) {
      continue;
    }

    kept.push(group);
  }

  return kept.sort(compareGroups);
};

const requireStream = (streams: ReadonlyMap<number, NormalizedStream>, fileId: number): NormalizedStream => {
  const stream = streams.get(fileId);

  if (stream === undefined) {
    throw new Error(`No normalized stream for file id ${fileId}`);
  }

  return stream;
};

/** Assembles the clone groups of one file pair. Partitions are independent of each other. */
export const assemblePartition = (
  partition: FilePairPartition,
  streams: ReadonlyMap<number, NormalizedStream>,
  options: AssembleOptions,
): CloneGroup[] => {
  const streamA = requireStream(streams, partition.fileIdA);
  const streamB = requireStream(streams, partition.fileIdB);
  const sameFile = partition.fileIdA === partition.fileIdB;
  const gapTolerance = Math.max(0, Math.floor(options.gapTolerance ?? 0));
  const minTokens = Math.max(1, Math.floor(options.minTokens));
  const sortedPairs = [...partition.pairs].sort(
    (left, right) => left.a.startIndex - right.a.startIndex || left.b.startIndex - right.b.startIndex,
  );
  const byDiagonal = new Map<number, MatchPair[]>();

  for (const pair of sortedPairs) {
    const diagonal = pair.b.startIndex - pair.a.startIndex;
    const list = byDiagonal.get(diagonal);

    if (list) {
      list.push(pair);
    } else {
      byDiagonal.set(diagonal, [pair]);
    }
  }

  const groups: CloneGroup[] = [];

  for (const [diagonal, pairs] of byDiagonal) {
    const runs = mergeOverlapping(coalesceDiagonal(pairs, diagonal, gapTolerance).map(run => extendRun(run, streamA, streamB)));

    for (const run of sameFile ? runs.flatMap(splitPeriodicRun) : runs) {
      const tokenCount = run.aEnd - run.aStart;

      if (tokenCount < minTokens) {
        continue;
      }

      groups.push({
        occurrenceA: toOccurrence(streamA, run.aStart, run.aEnd),
        occurrenceB: toOccurrence(streamB, run.aStart + diagonal, run.aEnd + diagonal),
        tokenCount,
      });
    }
  }

  return dropSubsumed(groups);
};

/**
 * Turns fingerprint collisions into maximal clone groups. Output is ordered by
 * file pair, then by start position, whatever order the index was filled in.
 */
export const assembleClones = (
  index: CorpusIndex,
  streams: ReadonlyMap<number, NormalizedStream>,
  options: AssembleOptions,
): CloneGroup[] => {
  return partitionMatchPairs(index).flatMap(partition => assemblePartition(partition, streams, options));
};
