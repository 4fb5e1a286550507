import type { KGram, NormalizedStream, Token, TokenHasher } from './types';

import { MASK_64, createTokenHasher, mix64 } from './hasher';

const BASE = 0x9e3779b185ebca87n;

const mul64 = (left: bigint, right: bigint): bigint => (left * right) & MASK_64;

const add64 = (left: bigint, right: bigint): bigint => (left + right) & MASK_64;

const textAt = (tokens: ReadonlyArray<Token>, index: number): string => {
  const token = tokens[index];

  if (token === undefined) {
    throw new Error(`Token index out of range: ${index}`);
  }

  return token.normalizedText;
};

function* iterateKGrams(stream: NormalizedStream, k: number, hashToken: TokenHasher): Generator<KGram, void, undefined> {
  const tokens = stream.tokens;
  const tokenCount = tokens.length;

  if (k <= 0 || tokenCount < k) {
    return;
  }

  let basePow = 1n;

  for (let index = 0; index < k - 1; index += 1) {
    basePow = mul64(basePow, BASE);
  }

  let rolling = 0n;

  for (let index = 0; index < k; index += 1) {
    rolling = add64(mul64(rolling, BASE), hashToken(textAt(tokens, index)));
  }

  for (let start = 0; ; start += 1) {
    yield { fileId: stream.fileId, startIndex: start, endIndex: start + k, hash: mix64(rolling) };

    const incoming = start + k;

    if (incoming >= tokenCount) {
      return;
    }

    const removed = mul64(hashToken(textAt(tokens, start)), basePow);

    rolling = (rolling - removed) & MASK_64;
    rolling = add64(mul64(rolling, BASE), hashToken(textAt(tokens, incoming)));
  }
}

/**
 * Lazily yields every k-gram of the stream with a rolling polynomial hash
 * (mod 2^64) over per-token hashes. Each iteration starts over from token 0.
 * Streams shorter than `k` yield nothing.
 */
export const generateKGrams = (
  stream: NormalizedStream,
  k: number,
  hashToken: TokenHasher = createTokenHasher(),
): Iterable<KGram> => {
  return {
    [Symbol.iterator]: () => iterateKGrams(stream, Math.floor(k), hashToken),
  };
};
