import xxh from 'xxhashjs';

/**
 * Values that can be inserted into a sketch. Arrays and plain objects are
 * hashed structurally, with object keys in sorted order, so equal values
 * hash equally regardless of how they were built.
 */
export type Hashable =
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | Uint8Array
  | readonly Hashable[]
  | {readonly [key: string]: Hashable};

/**
 * Maps an item to an unsigned 64-bit integer, `0n <= h < 2n ** 64n`.
 *
 * The estimator only relies on the output bits being close to uniformly
 * distributed. Swapping the hasher (or its seed) changes which registers
 * individual items land in, and therefore the exact estimate produced for a
 * given input, but not the error bound.
 */
export type Hasher = (item: Hashable) => bigint;

export const DEFAULT_SEED = 0;

const MAX_SEED = 0xffffffff;

/**
 * XXH64 of the item's canonical string form. Seeds are unsigned 32-bit
 * integers.
 */
export function xxhash64Hasher(seed = DEFAULT_SEED): Hasher {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new RangeError(`Hash seed must be a uint32: ${seed}`);
  }
  return item =>
    BigInt(
      '0x' + xxh.h64(seed).update(canonicalString(item)).digest().toString(16),
    );
}

/**
 * Serializes an item to a string for hashing.
 *
 * Different types get different prefixes to avoid collisions
 * (e.g., number 42 vs string "42").
 */
export function canonicalString(item: Hashable): string {
  if (item === null) return '\0null';
  if (item === undefined) return '\0undefined';

  switch (typeof item) {
    case 'string':
      return `s:${item}`;
    case 'number':
      return `n:${item}`;
    case 'boolean':
      return `b:${item}`;
    case 'bigint':
      return `i:${item}`;
  }

  if (item instanceof Uint8Array) {
    return `u:${Buffer.from(item).toString('hex')}`;
  }
  if (isArray(item)) {
    return `a:${JSON.stringify(item.map(canonicalString))}`;
  }
  const entries = Object.keys(item)
    .sort()
    .map(key => [key, canonicalString(item[key])]);
  return `o:${JSON.stringify(entries)}`;
}

function isArray(item: Hashable): item is readonly Hashable[] {
  return Array.isArray(item);
}
