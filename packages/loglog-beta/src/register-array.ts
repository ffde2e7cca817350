import {assert} from '../../shared/src/asserts.ts';

/**
 * Fixed-length array of register ranks. Every register starts at 0 and only
 * ever grows, and no register exceeds `maxRank`.
 *
 * Ranks are at most 61 (for the smallest supported precision), so one byte
 * per register suffices in memory. The packed 6-bit layout is only used when
 * serializing (see `serialization.ts`).
 */
export class RegisterArray {
  readonly #ranks: Uint8Array;
  readonly #maxRank: number;

  constructor(length: number, maxRank: number) {
    assert(length > 0, 'Register array must not be empty');
    assert(maxRank > 0 && maxRank < 256, `Invalid max rank: ${maxRank}`);
    this.#ranks = new Uint8Array(length);
    this.#maxRank = maxRank;
  }

  /**
   * Creates an array holding a copy of `ranks`. Fails if any rank is out of
   * bounds.
   */
  static from(ranks: ArrayLike<number>, maxRank: number): RegisterArray {
    const registers = new RegisterArray(ranks.length, maxRank);
    for (let i = 0; i < ranks.length; i++) {
      const rank = ranks[i];
      assert(
        Number.isInteger(rank) && rank >= 0 && rank <= maxRank,
        () => `Register ${i} holds ${rank}, expected 0..${maxRank}`,
      );
      registers.#ranks[i] = rank;
    }
    return registers;
  }

  get length(): number {
    return this.#ranks.length;
  }

  get maxRank(): number {
    return this.#maxRank;
  }

  get(i: number): number {
    assert(i >= 0 && i < this.#ranks.length, () => `Index out of range: ${i}`);
    return this.#ranks[i];
  }

  /** `register[i] = max(register[i], min(rank, maxRank))` */
  raise(i: number, rank: number): void {
    const current = this.get(i);
    const capped = Math.min(rank, this.#maxRank);
    if (capped > current) {
      this.#ranks[i] = capped;
    }
  }

  /**
   * Returns a new array holding, at every index, the larger of the two
   * inputs' ranks. Neither input is modified.
   */
  pointwiseMax(other: RegisterArray): RegisterArray {
    assert(
      this.length === other.length,
      () =>
        `Cannot combine register arrays of different length: ${this.length} !== ${other.length}`,
    );
    const result = new RegisterArray(
      this.length,
      Math.max(this.#maxRank, other.#maxRank),
    );
    const a = this.#ranks;
    const b = other.#ranks;
    for (let i = 0; i < a.length; i++) {
      result.#ranks[i] = a[i] > b[i] ? a[i] : b[i];
    }
    return result;
  }

  /** A copy of the ranks, in index order. */
  toUint8Array(): Uint8Array {
    return this.#ranks.slice();
  }

  equals(other: RegisterArray): boolean {
    if (this.length !== other.length) {
      return false;
    }
    for (let i = 0; i < this.#ranks.length; i++) {
      if (this.#ranks[i] !== other.#ranks[i]) {
        return false;
      }
    }
    return true;
  }
}
