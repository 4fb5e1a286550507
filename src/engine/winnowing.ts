import type { Fingerprint, KGram } from './types';

interface WindowEntry {
  readonly ordinal: number;
  readonly kgram: KGram;
}

/**
 * Minimum repeated run (in tokens) that is guaranteed to share at least one
 * fingerprint between its two locations.
 */
export const detectionThreshold = (k: number, window: number): number => k + window - 1;

/**
 * Winnowing over a single file's k-gram hashes.
 *
 * Each window of `window` consecutive k-grams contributes its minimum hash; on
 * ties the rightmost position wins. A position is emitted once even if it stays
 * the minimum across several windows. A file with fewer k-grams than `window`
 * emits the minimum of what it has.
 */
export const selectFingerprints = (kgrams: Iterable<KGram>, window: number): Fingerprint[] => {
  const windowSize = Math.max(1, Math.floor(window));
  const selected: Fingerprint[] = [];
  const deque: WindowEntry[] = [];
  let ordinal = 0;
  let lastEmittedIndex = -1;

  const emit = (entry: WindowEntry | undefined): void => {
    if (entry === undefined || entry.kgram.startIndex === lastEmittedIndex) {
      return;
    }

    const { hash, fileId, startIndex, endIndex } = entry.kgram;

    selected.push({ hash, fileId, startIndex, endIndex });

    lastEmittedIndex = startIndex;
  };

  for (const kgram of kgrams) {
    // Popping on equality keeps the rightmost of equal minima at the front.
    while (deque.length > 0) {
      const last = deque[deque.length - 1];

      if (last === undefined || last.kgram.hash < kgram.hash) {
        break;
      }

      deque.pop();
    }

    deque.push({ ordinal, kgram });

    const windowStart = ordinal - windowSize + 1;

    while (deque.length > 0 && (deque[0]?.ordinal ?? windowStart) < windowStart) {
      deque.shift();
    }

    if (ordinal >= windowSize - 1) {
      emit(deque[0]);
    }

    ordinal += 1;
  }

  if (ordinal > 0 && ordinal < windowSize) {
    emit(deque[0]);
  }

  return selected;
};
