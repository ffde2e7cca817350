export type CardinalityErrorKind =
  | 'InvalidErrorRate'
  | 'InvalidPrecision'
  | 'PrecisionMismatch'
  | 'InvalidSketchData';

/**
 * Base class of the precondition failures reported by sketch construction,
 * merging and deserialization. None of them leave a sketch partially
 * modified.
 */
export abstract class CardinalityError extends Error {
  abstract readonly kind: CardinalityErrorKind;
}

export class InvalidErrorRateError extends CardinalityError {
  override readonly name = 'InvalidErrorRateError';
  override readonly kind = 'InvalidErrorRate';
  readonly errorRate: number;

  constructor(errorRate: number, reason: string) {
    super(`Invalid error rate ${errorRate}: ${reason}`);
    this.errorRate = errorRate;
  }
}

export class InvalidPrecisionError extends CardinalityError {
  override readonly name = 'InvalidPrecisionError';
  override readonly kind = 'InvalidPrecision';
  readonly precision: number;

  constructor(precision: number, min: number, max: number) {
    super(`Precision must be an integer between ${min} and ${max}: ${precision}`);
    this.precision = precision;
  }
}

export class PrecisionMismatchError extends CardinalityError {
  override readonly name = 'PrecisionMismatchError';
  override readonly kind = 'PrecisionMismatch';
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      `Cannot merge sketches with different precision: ${expected} !== ${actual}`,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidSketchDataError extends CardinalityError {
  override readonly name = 'InvalidSketchDataError';
  override readonly kind = 'InvalidSketchData';
}
