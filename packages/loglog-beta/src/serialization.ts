import {InvalidSketchDataError} from './errors.ts';
import {
  assertPrecision,
  maxRank,
  registerCount,
  registerWidth,
} from './precision.ts';
import {RegisterArray} from './register-array.ts';
import * as v from '../../shared/src/valita.ts';

/**
 * Serialized sketch. `registers` is the base64 encoding of the register
 * ranks in index order, each packed into `registerWidth(precision)` bits,
 * most significant bit first. The last byte is zero-padded.
 *
 * The hasher is not part of the serialized form: a sketch must be restored
 * with the hasher it was built with for further inserts to be meaningful.
 */
export type LogLogBetaJSON = v.Infer<typeof sketchJSONSchema>;

export const SKETCH_VERSION = 1;

export const sketchJSONSchema = v.object({
  version: v.literal(SKETCH_VERSION),
  precision: v.number(),
  registers: v.string(),
});

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function encodeSketch(
  precision: number,
  registers: RegisterArray,
): LogLogBetaJSON {
  return {
    version: SKETCH_VERSION,
    precision,
    registers: Buffer.from(
      packRegisters(registers.toUint8Array(), registerWidth(precision)),
    ).toString('base64'),
  };
}

/**
 * @throws InvalidSketchDataError if `json` is not a well-formed sketch.
 * @throws InvalidPrecisionError if its precision is not supported.
 */
export function decodeSketch(json: unknown): {
  precision: number;
  registers: RegisterArray;
} {
  const res = sketchJSONSchema.try(json, {mode: 'strict'});
  if (!res.ok) {
    throw new InvalidSketchDataError(`Malformed sketch: ${res.message}`);
  }
  const {precision, registers: encoded} = res.value;
  assertPrecision(precision);

  const m = registerCount(precision);
  const width = registerWidth(precision);
  const expectedBytes = Math.ceil((m * width) / 8);
  if (!BASE64.test(encoded)) {
    throw new InvalidSketchDataError('Registers are not base64 encoded');
  }
  const packed = Buffer.from(encoded, 'base64');
  if (packed.length !== expectedBytes) {
    throw new InvalidSketchDataError(
      `Expected ${expectedBytes} bytes of registers for precision ${precision}, got ${packed.length}`,
    );
  }

  const ranks = unpackRegisters(packed, m, width);
  const max = maxRank(precision);
  const bad = ranks.findIndex(rank => rank > max);
  if (bad >= 0) {
    throw new InvalidSketchDataError(
      `Register ${bad} holds ${ranks[bad]}, which exceeds the maximum rank ${max}`,
    );
  }
  return {precision, registers: RegisterArray.from(ranks, max)};
}

export function packRegisters(ranks: Uint8Array, width: number): Uint8Array {
  const out = new Uint8Array(Math.ceil((ranks.length * width) / 8));
  let bit = 0;
  for (const rank of ranks) {
    for (let b = width - 1; b >= 0; b--, bit++) {
      if ((rank >> b) & 1) {
        out[bit >> 3] |= 0x80 >> (bit & 7);
      }
    }
  }
  return out;
}

export function unpackRegisters(
  packed: Uint8Array,
  count: number,
  width: number,
): Uint8Array {
  const ranks = new Uint8Array(count);
  let bit = 0;
  for (let i = 0; i < count; i++) {
    let rank = 0;
    for (let b = 0; b < width; b++, bit++) {
      rank = (rank << 1) | ((packed[bit >> 3] >> (7 - (bit & 7))) & 1);
    }
    ranks[i] = rank;
  }
  return ranks;
}
