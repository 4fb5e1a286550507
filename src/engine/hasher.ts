import type { TokenHasher } from './types';

const FNV_OFFSET = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

const toU64Hex = (value: bigint): string => {
  const unsigned = BigInt.asUintN(64, value);

  return unsigned.toString(16).padStart(16, '0');
};

/**
 * FNV-1a 64 over the UTF-16 code units of `<length>:<text>`. The length prefix
 * keeps token boundaries unambiguous once hashes are mixed into a k-gram.
 */
const hashString = (input: string): bigint => {
  const framed = `${input.length}:${input}`;
  let hash = FNV_OFFSET;

  for (let index = 0; index < framed.length; index += 1) {
    const codeUnit = framed.charCodeAt(index);

    hash ^= BigInt(codeUnit & 0xff);
    hash = (hash * FNV_PRIME) & MASK_64;
    hash ^= BigInt(codeUnit >> 8);
    hash = (hash * FNV_PRIME) & MASK_64;
  }

  return hash;
};

/** splitmix64 finalizer; a bijection on u64, so it never adds collisions. */
const mix64 = (value: bigint): bigint => {
  let z = value & MASK_64;

  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;

  return z ^ (z >> 31n);
};

const createTokenHasher = (): TokenHasher => {
  const cache = new Map<string, bigint>();

  return (text: string): bigint => {
    const cached = cache.get(text);

    if (cached !== undefined) {
      return cached;
    }

    const hash = hashString(text);

    cache.set(text, hash);

    return hash;
  };
};

export { MASK_64, createTokenHasher, hashString, mix64, toU64Hex };
