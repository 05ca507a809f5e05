import { DType } from './dtype.js';
import { DTypeError } from '../error.js';

function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * IEEE 754 double precision. The default element type.
 */
export const float64: DType<number> = {
  name: 'float64',
  zero: 0,
  one: 1,
  isScalar: (value): value is number => typeof value === 'number',
  coerce: (value) => value,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  equals: (a, b) => a === b,
  format: (value) => String(value),
  compare: compareNumbers,
  fromNumber: (value) => value,
  toNumber: (value) => value,
  alloc: (length) => new Float64Array(length),
};

/**
 * 32-bit signed integers with two's complement wrap-around.
 *
 * Every operation wraps, including each step of a dot product.
 */
export const int32: DType<number> = {
  name: 'int32',
  zero: 0,
  one: 1,
  isScalar: (value): value is number => typeof value === 'number' && Number.isInteger(value),
  coerce: (value) => value | 0,
  add: (a, b) => (a + b) | 0,
  sub: (a, b) => (a - b) | 0,
  mul: (a, b) => Math.imul(a, b),
  equals: (a, b) => a === b,
  format: (value) => String(value),
  compare: compareNumbers,
  // Truncates toward zero, like a C cast
  fromNumber: (value) => {
    if (!Number.isFinite(value)) {
      throw new DTypeError(`Cannot convert ${value} to int32`);
    }
    return Math.trunc(value) | 0;
  },
  toNumber: (value) => value,
  fromBigInt: (value) => Number(BigInt.asIntN(32, value)),
  toBigInt: (value) => BigInt(value),
  alloc: (length) => new Int32Array(length),
};

/**
 * 64-bit signed integers stored as bigint, wrapping at 64 bits.
 */
export const int64: DType<bigint> = {
  name: 'int64',
  zero: 0n,
  one: 1n,
  isScalar: (value): value is bigint => typeof value === 'bigint',
  coerce: (value) => BigInt.asIntN(64, value),
  add: (a, b) => BigInt.asIntN(64, a + b),
  sub: (a, b) => BigInt.asIntN(64, a - b),
  mul: (a, b) => BigInt.asIntN(64, a * b),
  equals: (a, b) => a === b,
  format: (value) => value.toString(),
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  fromNumber: (value) => {
    if (!Number.isFinite(value)) {
      throw new DTypeError(`Cannot convert ${value} to int64`);
    }
    return BigInt.asIntN(64, BigInt(Math.trunc(value)));
  },
  toNumber: (value) => Number(value),
  fromBigInt: (value) => BigInt.asIntN(64, value),
  toBigInt: (value) => value,
  alloc: (length) => new BigInt64Array(length),
};
