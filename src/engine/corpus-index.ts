import type { Fingerprint } from './types';

import { toU64Hex } from './hasher';

export interface CorpusIndexStats {
  readonly fingerprints: number;
  readonly distinctHashes: number;
  readonly collisionBuckets: number;
  /** Most crowded retained bucket, hash as 16 hex digits; the first one built wins a tie. */
  readonly largestBucket: { readonly hash: string; readonly occurrences: number } | null;
}

/** Frozen hash → occurrences map. Only buckets with two or more occurrences survive the freeze. */
export interface CorpusIndex {
  readonly stats: CorpusIndexStats;
  lookup(hash: bigint): ReadonlyArray<Fingerprint>;
  buckets(): IterableIterator<[bigint, ReadonlyArray<Fingerprint>]>;
}

export interface CorpusIndexBuilder {
  add(fingerprints: ReadonlyArray<Fingerprint>): void;
  freeze(): CorpusIndex;
}

const EMPTY: ReadonlyArray<Fingerprint> = Object.freeze([]);

const positionKey = (fingerprint: Fingerprint): string => `${fingerprint.fileId}:${fingerprint.startIndex}`;

/**
 * Single-writer builder. Callers fold per-file results in file-id order after
 * the worker barrier; the resulting index is read-only.
 */
export const createCorpusIndexBuilder = (): CorpusIndexBuilder => {
  const buckets = new Map<bigint, Fingerprint[]>();
  const positions = new Set<string>();
  let total = 0;
  let frozen = false;

  const add = (fingerprints: ReadonlyArray<Fingerprint>): void => {
    if (frozen) {
      throw new Error('Corpus index is frozen');
    }

    for (const fingerprint of fingerprints) {
      const key = positionKey(fingerprint);

      if (positions.has(key)) {
        throw new Error(`Duplicate fingerprint position ${key}`);
      }

      positions.add(key);

      const bucket = buckets.get(fingerprint.hash);

      if (bucket) {
        bucket.push(fingerprint);
      } else {
        buckets.set(fingerprint.hash, [fingerprint]);
      }

      total += 1;
    }
  };

  const freeze = (): CorpusIndex => {
    if (frozen) {
      throw new Error('Corpus index is already frozen');
    }

    frozen = true;

    const retained = new Map<bigint, ReadonlyArray<Fingerprint>>();
    let largest: [bigint, number] | null = null;

    for (const [hash, bucket] of buckets) {
      if (bucket.length < 2) {
        continue;
      }

      retained.set(hash, Object.freeze([...bucket]));

      if (largest === null || bucket.length > largest[1]) {
        largest = [hash, bucket.length];
      }
    }

    const stats: CorpusIndexStats = {
      fingerprints: total,
      distinctHashes: buckets.size,
      collisionBuckets: retained.size,
      largestBucket: largest === null ? null : { hash: toU64Hex(largest[0]), occurrences: largest[1] },
    };

    buckets.clear();
    positions.clear();

    return {
      stats,
      lookup: (hash: bigint) => retained.get(hash) ?? EMPTY,
      buckets: () => retained.entries(),
    };
  };

  return { add, freeze };
};

export const buildCorpusIndex = (fingerprintsByFile: Iterable<ReadonlyArray<Fingerprint>>): CorpusIndex => {
  const builder = createCorpusIndexBuilder();

  for (const fingerprints of fingerprintsByFile) {
    builder.add(fingerprints);
  }

  return builder.freeze();
};
