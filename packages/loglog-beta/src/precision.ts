import {InvalidErrorRateError, InvalidPrecisionError} from './errors.ts';

/** 2^4 = 16 registers is the smallest array the bias correction is fit for. */
export const MIN_PRECISION = 4;

/** 2^18 registers, 256 KiB unpacked. */
export const MAX_PRECISION = 18;

export const HASH_BITS = 64;

/**
 * Derives the precision whose standard error, `1.04 / sqrt(2^p)`, is at
 * most `errorRate`: `p = ceil(log2((1.04 / errorRate)^2))`.
 */
export function precisionForErrorRate(errorRate: number): number {
  if (!(errorRate > 0 && errorRate < 1)) {
    throw new InvalidErrorRateError(errorRate, 'must be between 0 and 1');
  }
  const p = Math.ceil(Math.log2((1.04 / errorRate) ** 2));
  if (p < MIN_PRECISION || p > MAX_PRECISION) {
    throw new InvalidErrorRateError(
      errorRate,
      `requires precision ${p}, outside of [${MIN_PRECISION}, ${MAX_PRECISION}]`,
    );
  }
  return p;
}

export function assertPrecision(precision: number): void {
  if (
    !Number.isInteger(precision) ||
    precision < MIN_PRECISION ||
    precision > MAX_PRECISION
  ) {
    throw new InvalidPrecisionError(precision, MIN_PRECISION, MAX_PRECISION);
  }
}

export function registerCount(precision: number): number {
  return 1 << precision;
}

/**
 * The largest rank a register can hold: the longest possible run of leading
 * zeros in the `64 - p` hash bits left after indexing, plus one.
 */
export function maxRank(precision: number): number {
  return HASH_BITS - precision + 1;
}

/** Bits needed to store one register, `ceil(log2(maxRank + 1))`. */
export function registerWidth(precision: number): number {
  return Math.ceil(Math.log2(maxRank(precision) + 1));
}

export function standardError(precision: number): number {
  return 1.04 / Math.sqrt(registerCount(precision));
}
